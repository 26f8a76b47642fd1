import type { ValidationIssue } from '../types';

export * from './type-spec.schema';
export * from './codec-plan.schema';

/** 构造统一的校验问题对象（解析/推导复用） */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return hint === undefined ? { code, path, message } : { code, path, message, hint };
}

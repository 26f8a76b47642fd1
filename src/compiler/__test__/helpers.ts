import type { AttrSet, AttrValue, ValidationIssue } from '../../types';

export const flag: AttrValue = { kind: 'flag' };
export const int = (value: bigint): AttrValue => ({ kind: 'int', value });
export const ident = (value: string): AttrValue => ({ kind: 'ident', value });
export const path = (value: string): AttrValue => ({ kind: 'path', value });

/** 保序构造属性集合 */
export function attrs(entries: Record<string, AttrValue> = {}): AttrSet {
  return new Map(Object.entries(entries));
}

/** 收集问题的 add_issue 替身 */
export function collector() {
  const issues: ValidationIssue[] = [];
  const add = (code: string, p: string, message: string, hint?: string) => {
    issues.push(hint === undefined ? { code, path: p, message } : { code, path: p, message, hint });
  };
  return { issues, add };
}

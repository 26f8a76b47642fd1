import type { AddIssue, CodecCatalog } from '../types';

/** 一次推导共享的只读环境 */
export interface DeriveContext {
  catalog: CodecCatalog;
  default_namespace: string;
  /** 致命：调用后推导函数返回 null */
  add_issue: AddIssue;
  /** 非致命：strict 模式下会升级为错误 */
  add_warning: AddIssue;
}

import type { CodecPlanType } from '../schema';
import type { CodecCatalog } from './codec.type';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  推导阶段（输入 / 诊断 / 输出）
 * ---------------------------*/

export interface DeriveOptions {
  /** 严格模式：warnings 同时作为 errors 上报（CI 门禁用）。 */
  strict?: boolean;
  /** 未配置 crate 时使用的编解码命名空间，默认 strict_encoding。 */
  default_namespace?: string;
}

/** 推导入口参数 */
export interface DeriveInput {
  /** 类型定义（已解析为 JS 对象；可能来自 JSON）。 */
  type_spec: unknown;
  /** 已知值类型目录；缺省为内置 strict_encoding。 */
  catalog?: CodecCatalog;
  options?: DeriveOptions;
}

export interface DeriveAllInput {
  type_specs: unknown[];
  catalog?: CodecCatalog;
  options?: DeriveOptions;
}

/** 推导输出（含成功/失败两种分支） */
export interface DeriveOutput {
  /** 成功时 errors 为空；warnings 可能非空。 */
  ok: boolean;
  /** 成功时给出计划；失败为 null（不返回部分计划）。 */
  plan: CodecPlanType | null;
  /** 计划稳定哈希（sha256:...）；失败为 null。 */
  plan_id: string | null;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** 推导耗时（毫秒）。 */
  time_ms: number;
}

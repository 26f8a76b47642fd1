import type { CodecPlanType } from '../schema';
import type { CodecCatalog } from '../types';

/**
 * 派生类型能否提供默认值：
 * 结构体当且仅当每个字段类型都有默认值；枚举没有。
 */
export function plan_has_default(plan: CodecPlanType, catalog: CodecCatalog): boolean {
  return plan.kind === 'struct' && plan.fields.every((f) => catalog.has_default(plan.codec_namespace, f.value_type));
}

/** 在 base 之上叠加一个已推导的类型（不修改 base） */
export function with_plan(base: CodecCatalog, plan: CodecPlanType): CodecCatalog {
  const has_default = plan_has_default(plan, base);
  const own = (namespace: string, type_name: string) =>
    namespace === plan.codec_namespace && type_name === plan.type_name;
  return {
    has_namespace: (namespace) => base.has_namespace(namespace),
    has_type: (namespace, type_name) => own(namespace, type_name) || base.has_type(namespace, type_name),
    has_default: (namespace, type_name) =>
      own(namespace, type_name) ? has_default : base.has_default(namespace, type_name),
  };
}

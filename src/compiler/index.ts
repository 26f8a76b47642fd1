import { builtin_registry, STRICT_ENCODING } from '../codecs/registry';
import { issue, parse_type_spec, type CodecPlanType } from '../schema';
import type { DeriveAllInput, DeriveInput, DeriveOutput, ValidationIssue } from '../types';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';
import { with_plan } from './catalog';
import type { DeriveContext } from './context';
import { derive_enum_plan } from './enum';
import { derive_struct_plan } from './struct';

/**
 * derive()
 * --------
 * TypeSpec → CodecPlan。纯函数：不做 IO，同样的输入得到同样的 plan_id。
 * 任一配置错误都会中止整个类型的推导，不返回部分计划。
 */
export function derive(input: DeriveInput): DeriveOutput {
  // 记时
  const t0 = Date.now();
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const failed = (): DeriveOutput => ({
    ok: false,
    plan: null,
    plan_id: null,
    errors,
    warnings,
    time_ms: Date.now() - t0,
  });

  // zod safe parse 获取结构校验结果
  const result = parse_type_spec(input.type_spec);
  if (!result.success) {
    // 把 Zod 的 issues 转成 ValidationIssue[]
    for (const e of result.error.issues) {
      errors.push(issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message));
    }
    return failed();
  }
  const spec = result.data;

  const ctx: DeriveContext = {
    catalog: input.catalog ?? builtin_registry(),
    default_namespace: input.options?.default_namespace ?? STRICT_ENCODING,
    add_issue: (code, path, message, hint) => errors.push(issue(code, path, message, hint)),
    add_warning: (code, path, message, hint) => warnings.push(issue(code, path, message, hint)),
  };

  const body = spec.kind === 'struct' ? derive_struct_plan(spec, ctx) : derive_enum_plan(spec, ctx);

  // 严格模式：告警同样阻断
  if (input.options?.strict) errors.push(...warnings);

  if (!body || errors.length) return failed();

  // 先占位再哈希：canonical_stringify 会剔除 undefined，保证 plan_id 不依赖自身
  const plan: CodecPlanType = { ...body, plan_id: 'sha256:pending' };
  const plan_id = hash_sha256(canonical_stringify({ ...plan, plan_id: undefined }));
  plan.plan_id = plan_id;

  return { ok: true, plan, plan_id, errors, warnings, time_ms: Date.now() - t0 };
}

/**
 * 按顺序推导一批类型；每个成功的计划都会加入目录，
 * 后面的类型可以把前面的类型当作字段值类型。
 */
export function derive_all(input: DeriveAllInput): DeriveOutput[] {
  let catalog = input.catalog ?? builtin_registry();
  const outputs: DeriveOutput[] = [];
  for (const type_spec of input.type_specs) {
    const out = derive({ type_spec, catalog, options: input.options });
    outputs.push(out);
    if (out.plan) catalog = with_plan(catalog, out.plan);
  }
  return outputs;
}

export { check_attrs, merge_attrs, strip_attrs, check_exclusive, requirements_for } from './attrs';
export { resolve_global_policy, resolve_member_policy } from './policy';
export { derive_struct_plan, derive_field_pipeline } from './struct';
export { derive_enum_plan, assign_discriminant } from './enum';
export { with_plan, plan_has_default } from './catalog';

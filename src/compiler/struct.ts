import type { DecodeOpType, EncodeOpType, FieldPlanType, FieldSpec, StructCodecPlanType } from '../schema';
import type { AttrSet, EncodingPolicy } from '../types';
import type { DeriveContext } from './context';
import { resolve_global_policy, type MemberContext, resolve_member_policy } from './policy';

/** 一组字段的编码/解码管线（结构体与枚举变体共用） */
export interface FieldPipeline {
  fields: FieldPlanType[];
  encode: EncodeOpType[];
  decode: DecodeOpType[];
}

/**
 * 按声明顺序推导字段管线：
 * - skip 字段：编码时不产生字节；解码时不消耗输入，填入类型默认值
 * - 其他字段：委托给字段值类型自身的编解码器
 * 值类型必须存在于命名空间中；skip 字段的类型还必须提供默认值。
 */
export function derive_field_pipeline(
  args: {
    context: Extract<MemberContext, 'struct_field' | 'variant_field'>;
    parent: EncodingPolicy;
    inherited: AttrSet;
    fields: ReadonlyArray<FieldSpec>;
    path: string;
  },
  ctx: DeriveContext,
): FieldPipeline | null {
  const out: FieldPipeline = { fields: [], encode: [], decode: [] };
  const ns = args.parent.codec_namespace;

  for (const field of args.fields) {
    const path = `${args.path}/fields/${field.index}`;
    const resolved = resolve_member_policy(
      {
        context: args.context,
        parent: args.parent,
        inherited: args.inherited,
        local: field.attrs,
        path,
        default_namespace: ctx.default_namespace,
      },
      ctx.add_issue,
    );
    if (!resolved) return null;

    if (!ctx.catalog.has_type(ns, field.type)) {
      ctx.add_issue('UNKNOWN_VALUE_TYPE', `${path}/type`, `type '${field.type}' is not defined in codec namespace '${ns}'`);
      return null;
    }

    const skip = resolved.policy.skip;
    if (skip && !ctx.catalog.has_default(ns, field.type)) {
      ctx.add_issue(
        'MISSING_DEFAULT',
        `${path}/attrs/skip`,
        `skipped field '${field.key}' has type '${field.type}' which supplies no default value`,
        'give the value codec a default() or remove `skip`',
      );
      return null;
    }

    out.fields.push({ key: field.key, name: field.name, index: field.index, value_type: field.type, skip });
    if (skip) {
      out.decode.push({ op: 'default_field', key: field.key, value_type: field.type });
    } else {
      out.encode.push({ op: 'encode_field', key: field.key, value_type: field.type });
      out.decode.push({ op: 'decode_field', key: field.key, value_type: field.type });
    }
  }

  return out;
}

/** 结构体计划（plan_id 由入口统一计算） */
export function derive_struct_plan(
  spec: { name: string; attrs: AttrSet; fields: FieldSpec[] },
  ctx: DeriveContext,
): Omit<StructCodecPlanType, 'plan_id'> | null {
  const global = resolve_global_policy(
    {
      kind: 'struct',
      attrs: spec.attrs,
      path: '',
      default_namespace: ctx.default_namespace,
      catalog: ctx.catalog,
    },
    ctx.add_issue,
  );
  if (!global) return null;

  const pipeline = derive_field_pipeline(
    {
      context: 'struct_field',
      parent: global.policy,
      inherited: global.inherited,
      fields: spec.fields,
      path: '',
    },
    ctx,
  );
  if (!pipeline) return null;

  return {
    plan_schema_version: 1,
    kind: 'struct',
    type_name: spec.name,
    codec_namespace: global.policy.codec_namespace,
    ...pipeline,
  };
}

import { uint_max, REPR_WIDTH } from '../codecs/int.codec';
import type { EnumCodecPlanType, VariantPlanType, VariantSpec } from '../schema';
import type { AttrSet, DiscriminantRepr, EncodingPolicy } from '../types';
import type { DeriveContext } from './context';
import { resolve_global_policy, resolve_member_policy } from './policy';
import { derive_field_pipeline } from './struct';

export interface Discriminant {
  value: bigint;
  source: VariantPlanType['discriminant_source'];
}

/**
 * 按变体 policy 分配判别值：
 * - explicit：value 必须落在 0..max(repr)
 * - by_order：声明下标，同样受 repr 上限约束
 * - by_native_ordinal：自身序数按 repr 宽度截断（二进制补码），截断改变了值时给出告警
 */
export function assign_discriminant(
  policy: EncodingPolicy,
  variant: Pick<VariantSpec, 'name' | 'index' | 'ordinal'>,
  path: string,
  ctx: Pick<DeriveContext, 'add_issue' | 'add_warning'>,
): Discriminant | null {
  const repr: DiscriminantRepr = policy.discriminant_repr;
  const max = uint_max(repr);
  const mode = policy.discriminant_mode;

  switch (mode.kind) {
    case 'explicit':
      if (mode.value < 0n || mode.value > max) {
        ctx.add_issue(
          'DISCRIMINANT_OUT_OF_RANGE',
          `${path}/attrs/value`,
          `value ${mode.value} of variant '${variant.name}' does not fit in ${repr}`,
        );
        return null;
      }
      return { value: mode.value, source: 'explicit' };

    case 'by_order': {
      const value = BigInt(variant.index);
      if (value > max) {
        ctx.add_issue(
          'DISCRIMINANT_OUT_OF_RANGE',
          path,
          `declaration index ${variant.index} of variant '${variant.name}' does not fit in ${repr}`,
          'widen `repr` or give the variant an explicit `value`',
        );
        return null;
      }
      return { value, source: 'by_order' };
    }

    case 'by_native_ordinal': {
      const value = BigInt.asUintN(REPR_WIDTH[repr] * 8, variant.ordinal);
      if (value !== variant.ordinal) {
        ctx.add_warning(
          'DISCRIMINANT_TRUNCATED',
          path,
          `ordinal ${variant.ordinal} of variant '${variant.name}' is cast to ${value} as ${repr}`,
        );
      }
      return { value, source: 'by_native_ordinal' };
    }
  }
}

/**
 * 枚举计划：
 *  - skip 变体整体退出分发（不可编码也不可解码）
 *  - 其余变体：编码 = 判别值 || 字段；解码由枚举层读判别值后按表分发
 *  - 分发表内判别值必须唯一，冲突即报错而不是"先匹配者胜"
 */
export function derive_enum_plan(
  spec: { name: string; attrs: AttrSet; variants: VariantSpec[] },
  ctx: DeriveContext,
): Omit<EnumCodecPlanType, 'plan_id'> | null {
  const global = resolve_global_policy(
    {
      kind: 'enum',
      attrs: spec.attrs,
      path: '',
      default_namespace: ctx.default_namespace,
      catalog: ctx.catalog,
    },
    ctx.add_issue,
  );
  if (!global) return null;

  const repr = global.policy.discriminant_repr;
  const variants: VariantPlanType[] = [];
  const skipped_variants: EnumCodecPlanType['skipped_variants'] = [];
  // 判别值（十进制串）→ 先占用它的变体
  const taken = new Map<string, VariantSpec>();

  for (const variant of spec.variants) {
    const path = `/variants/${variant.index}`;
    const resolved = resolve_member_policy(
      {
        context: 'enum_variant',
        parent: global.policy,
        inherited: global.inherited,
        local: variant.attrs,
        path,
        default_namespace: ctx.default_namespace,
      },
      ctx.add_issue,
    );
    if (!resolved) return null;

    if (resolved.policy.skip) {
      skipped_variants.push({ name: variant.name, index: variant.index });
      continue;
    }

    const discriminant = assign_discriminant(resolved.policy, variant, path, ctx);
    if (!discriminant) return null;

    const key = discriminant.value.toString();
    const holder = taken.get(key);
    if (holder) {
      ctx.add_issue(
        'DUPLICATE_DISCRIMINANT',
        path,
        `variant '${variant.name}' reuses discriminant ${key} already assigned to '${holder.name}'`,
      );
      return null;
    }
    taken.set(key, variant);

    const pipeline = derive_field_pipeline(
      {
        context: 'variant_field',
        parent: resolved.policy,
        inherited: resolved.attrs,
        fields: variant.fields,
        path,
      },
      ctx,
    );
    if (!pipeline) return null;

    variants.push({
      name: variant.name,
      index: variant.index,
      discriminant: key,
      discriminant_source: discriminant.source,
      fields: pipeline.fields,
      encode: [{ op: 'write_discriminant', repr, value: key }, ...pipeline.encode],
      decode: pipeline.decode,
    });
  }

  if (variants.length === 0) {
    ctx.add_warning(
      'EMPTY_DISPATCH',
      '/variants',
      `enum '${spec.name}' has no encodable variant; every decode fails with UNKNOWN_VARIANT`,
    );
  }

  return {
    plan_schema_version: 1,
    kind: 'enum',
    type_name: spec.name,
    codec_namespace: global.policy.codec_namespace,
    discriminant_repr: repr,
    variants,
    skipped_variants,
  };
}

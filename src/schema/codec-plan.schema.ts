import { z } from 'zod';
import { DISCRIMINANT_REPRS } from '../types/policy.type';

/**
 * 编解码计划 v1 的结构校验（"目标形状"）。
 * 计划是交给外部代码生成器的抽象过程描述；engine 也可直接绑定执行。
 */

const Plan_Repr = z.enum(DISCRIMINANT_REPRS);

/** 十进制无符号整数串（覆盖 u64，且可 JSON 序列化） */
const Plan_UIntString = z.string().regex(/^(0|[1-9][0-9]*)$/, 'expected a decimal unsigned integer');

/**
 * 编码原子操作：
 * - write_discriminant：按 repr 宽度写判别值（小端）
 * - encode_field：用字段值类型自身的编码器写出字段
 */
const Plan_EncodeOp = z.discriminatedUnion('op', [
  z.object({ op: z.literal('write_discriminant'), repr: Plan_Repr, value: Plan_UIntString }),
  z.object({ op: z.literal('encode_field'), key: z.string(), value_type: z.string() }),
]);

/**
 * 解码原子操作：
 * - decode_field：用字段值类型自身的解码器读取
 * - default_field：skip 字段，不消耗输入，填入类型默认值
 */
const Plan_DecodeOp = z.discriminatedUnion('op', [
  z.object({ op: z.literal('decode_field'), key: z.string(), value_type: z.string() }),
  z.object({ op: z.literal('default_field'), key: z.string(), value_type: z.string() }),
]);

const Plan_Field = z.object({
  key: z.string(),
  name: z.string().nullable(),
  index: z.number().int().nonnegative(),
  value_type: z.string(),
  skip: z.boolean(),
});

const Plan_Variant = z.object({
  name: z.string(),
  index: z.number().int().nonnegative(),
  /** 已按 repr 收窄后的判别值 */
  discriminant: Plan_UIntString,
  discriminant_source: z.enum(['explicit', 'by_order', 'by_native_ordinal']),
  fields: z.array(Plan_Field),
  /** 首个 op 恒为 write_discriminant */
  encode: z.array(Plan_EncodeOp),
  /** 判别值读取由枚举层完成，这里只含字段 */
  decode: z.array(Plan_DecodeOp),
});

export const StructCodecPlan = z.object({
  plan_schema_version: z.literal(1),
  /** 全量计划的稳定哈希（sha256:...），由 canonical JSON 计算得到 */
  plan_id: z.string(),
  kind: z.literal('struct'),
  type_name: z.string(),
  codec_namespace: z.string(),
  fields: z.array(Plan_Field),
  encode: z.array(Plan_EncodeOp),
  decode: z.array(Plan_DecodeOp),
});

export const EnumCodecPlan = z.object({
  plan_schema_version: z.literal(1),
  plan_id: z.string(),
  kind: z.literal('enum'),
  type_name: z.string(),
  codec_namespace: z.string(),
  discriminant_repr: Plan_Repr,
  /** 参与编解码分发的变体（按声明顺序） */
  variants: z.array(Plan_Variant),
  /** skip 变体：既不可编码也不可解码 */
  skipped_variants: z.array(z.object({ name: z.string(), index: z.number().int().nonnegative() })),
});

export const CodecPlan = z.discriminatedUnion('kind', [StructCodecPlan, EnumCodecPlan]);

/** 安全解析计划（例如从 plans.out.json 读回）：成功返回 { success:true, data } */
export function parse_plan(input: unknown) {
  return CodecPlan.safeParse(input);
}

export type EncodeOpType = z.infer<typeof Plan_EncodeOp>;
export type DecodeOpType = z.infer<typeof Plan_DecodeOp>;
export type FieldPlanType = z.infer<typeof Plan_Field>;
export type VariantPlanType = z.infer<typeof Plan_Variant>;
export type StructCodecPlanType = z.infer<typeof StructCodecPlan>;
export type EnumCodecPlanType = z.infer<typeof EnumCodecPlan>;
export type CodecPlanType = z.infer<typeof CodecPlan>;

import { z } from 'zod';
import type { AttrSet, AttrValue } from '../types';

/**
 * TypeSpec v1 的结构校验（只做形状与命名检查，不做属性语义检查）。
 * 属性语义由 compiler/attrs + compiler/policy 负责。
 */

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PATH_RE = /^(::)?[A-Za-z_][A-Za-z0-9_]*(::[A-Za-z_][A-Za-z0-9_]*)+$/;

/**
 * 整数字面量：安全整数可直接写 number；
 * 超出 2^53 的值（如 u64 上限）用 { "int": "十进制串" } 精确给出
 */
const TS_IntLiteral = z.union([
  z.number().int().safe(),
  z.bigint(),
  z.object({ int: z.string().regex(/^-?(0|[1-9][0-9]*)$/, 'expected a decimal integer string') }).strict(),
]);

function to_bigint(raw: z.output<typeof TS_IntLiteral>): bigint {
  if (typeof raw === 'bigint') return raw;
  if (typeof raw === 'number') return BigInt(raw);
  return BigInt(raw.int);
}

/**
 * 属性值简写 → 分类值：
 * - "u16" → ident；"a::b" → path
 * - 200 / 200n / { int: "200" } → int
 * - true / null → flag
 */
const TS_AttrValue = z
  .union([z.string(), TS_IntLiteral, z.literal(true), z.null()])
  .transform((raw, ctx): AttrValue => {
    if (raw === true || raw === null) return { kind: 'flag' };
    if (typeof raw !== 'string') return { kind: 'int', value: to_bigint(raw) };
    if (IDENT_RE.test(raw)) return { kind: 'ident', value: raw };
    if (PATH_RE.test(raw)) return { kind: 'path', value: raw };
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `'${raw}' is neither an identifier nor a path`,
    });
    return z.NEVER;
  });

/** 属性字典：缺省为空集；转成保序 Map */
const TS_Attrs = z
  .record(z.string(), TS_AttrValue)
  .optional()
  .transform((rec): AttrSet => new Map(Object.entries(rec ?? {})));

/** 字段：name 为 null/缺省表示按位置的元组字段 */
const TS_Field = z
  .object({
    name: z.string().regex(IDENT_RE, 'field name must be an identifier').nullable().optional(),
    index: z.number().int().nonnegative().optional(),
    /** 值类型名（在编解码命名空间内查找） */
    type: z.string().min(1, 'field type must not be empty'),
    attrs: TS_Attrs,
  })
  .strict();

const TS_Variant = z
  .object({
    name: z.string().regex(IDENT_RE, 'variant name must be an identifier'),
    index: z.number().int().nonnegative().optional(),
    /** 变体自身序数；缺省为上一个 + 1（首个为 0） */
    ordinal: TS_IntLiteral.optional(),
    fields: z.array(TS_Field).optional(),
    attrs: TS_Attrs,
  })
  .strict();

const TS_Struct = z
  .object({
    name: z.string().regex(IDENT_RE, 'type name must be an identifier'),
    kind: z.literal('struct'),
    attrs: TS_Attrs,
    fields: z.array(TS_Field),
  })
  .strict();

const TS_Enum = z
  .object({
    name: z.string().regex(IDENT_RE, 'type name must be an identifier'),
    kind: z.literal('enum'),
    attrs: TS_Attrs,
    variants: z.array(TS_Variant),
  })
  .strict();

type RawField = z.output<typeof TS_Field>;
type RawVariant = z.output<typeof TS_Variant>;

/** ---------------------------
 *  规范化后的 TypeSpec（声明顺序显式化为 index）
 * ---------------------------*/

export interface FieldSpec {
  /** 具名字段为 name；元组字段为位置的十进制串 */
  key: string;
  name: string | null;
  index: number;
  type: string;
  attrs: AttrSet;
}

export interface VariantSpec {
  name: string;
  index: number;
  ordinal: bigint;
  fields: FieldSpec[];
  attrs: AttrSet;
}

export type TypeSpecType =
  | { name: string; kind: 'struct'; attrs: AttrSet; fields: FieldSpec[] }
  | { name: string; kind: 'enum'; attrs: AttrSet; variants: VariantSpec[] };

/** index 要么全缺省（取数组位置），要么全给出且构成 0..n-1 的排列 */
function check_indices(
  items: ReadonlyArray<{ index?: number }>,
  ctx: z.RefinementCtx,
  path: (string | number)[],
): void {
  const given = items.filter((it) => it.index !== undefined).length;
  if (given === 0) return;
  if (given !== items.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'index must be given on every member or on none',
      path,
    });
    return;
  }
  const seen = new Set(items.map((it) => it.index));
  for (let i = 0; i < items.length; i++) {
    if (!seen.has(i)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `indices must form a permutation of 0..${items.length - 1}; missing ${i}`,
        path,
      });
      return;
    }
  }
}

function check_fields(fields: RawField[], ctx: z.RefinementCtx, path: (string | number)[]): void {
  check_indices(fields, ctx, path);
  const named = fields.filter((f) => f.name != null).length;
  if (named !== 0 && named !== fields.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'fields must be either all named or all positional',
      path,
    });
  }
  const names = new Set<string>();
  fields.forEach((f, i) => {
    if (f.name == null) return;
    if (names.has(f.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate field name '${f.name}'`,
        path: [...path, i, 'name'],
      });
    }
    names.add(f.name);
  });
}

function by_index<T extends { index?: number }>(items: T[]): Array<{ item: T; index: number }> {
  return items
    .map((item, pos) => ({ item, index: item.index ?? pos }))
    .sort((a, b) => a.index - b.index);
}

function normalize_fields(fields: RawField[]): FieldSpec[] {
  return by_index(fields).map(({ item, index }) => {
    const name = item.name ?? null;
    return { key: name ?? String(index), name, index, type: item.type, attrs: item.attrs };
  });
}

function normalize_variants(variants: RawVariant[]): VariantSpec[] {
  let next_ordinal = 0n;
  return by_index(variants).map(({ item, index }) => {
    const ordinal = item.ordinal === undefined ? next_ordinal : to_bigint(item.ordinal);
    next_ordinal = ordinal + 1n;
    return {
      name: item.name,
      index,
      ordinal,
      fields: normalize_fields(item.fields ?? []),
      attrs: item.attrs,
    };
  });
}

export const TypeSpec = z
  .discriminatedUnion('kind', [TS_Struct, TS_Enum])
  .superRefine((spec, ctx) => {
    if (spec.kind === 'struct') {
      check_fields(spec.fields, ctx, ['fields']);
      return;
    }
    check_indices(spec.variants, ctx, ['variants']);
    const names = new Set<string>();
    spec.variants.forEach((v, vi) => {
      if (names.has(v.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate variant name '${v.name}'`,
          path: ['variants', vi, 'name'],
        });
      }
      names.add(v.name);
      check_fields(v.fields ?? [], ctx, ['variants', vi, 'fields']);
    });
  })
  .transform((spec): TypeSpecType =>
    spec.kind === 'struct'
      ? { name: spec.name, kind: 'struct', attrs: spec.attrs, fields: normalize_fields(spec.fields) }
      : { name: spec.name, kind: 'enum', attrs: spec.attrs, variants: normalize_variants(spec.variants) },
  );

/** 安全解析 TypeSpec：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_type_spec(input: unknown) {
  return TypeSpec.safeParse(input);
}

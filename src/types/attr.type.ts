/** ---------------------------
 *  属性（已分词的 key / 分类后的 value）
 * ---------------------------*/

/**
 * 分类后的属性值：
 * - ident：单个标识符（如 u16）
 * - path：以 :: 分隔的标识符路径（如 my_codecs::wire）
 * - int：整数字面量（统一存为 bigint，覆盖 u64 范围）
 * - flag：无值标记（如 skip / by_value）
 */
export type AttrValue =
  | { kind: 'ident'; value: string }
  | { kind: 'path'; value: string }
  | { kind: 'int'; value: bigint }
  | { kind: 'flag' };

/** 一个作用域内的属性集合；Map 保留声明顺序，且不可变 */
export type AttrSet = ReadonlyMap<string, AttrValue>;

/** 值类别；path 同时接受 ident（单段路径） */
export type ValueClass = 'ident' | 'path' | 'int' | 'flag';

/**
 * 单个属性键的要求：
 * - required_with_default：缺省时填入默认值；出现时须属于给定类别
 * - optional：可缺省；出现时须属于给定类别
 * - prohibited：在该上下文中出现即报错
 */
export type AttrRequirement =
  | { req: 'required_with_default'; class: ValueClass; default: AttrValue }
  | { req: 'optional'; class: ValueClass }
  | { req: 'prohibited' };

/** 键 → 要求；不在表中的键一律视为未识别 */
export type RequirementTable = ReadonlyMap<string, AttrRequirement>;

/**
 * 校验上下文：
 * - *_global：类型级
 * - field_local / variant_local：仅本地属性（合并前）
 * - struct_field / enum_variant / variant_field：合并后的属性
 */
export type RequirementContext =
  | 'struct_global'
  | 'enum_global'
  | 'field_local'
  | 'variant_local'
  | 'struct_field'
  | 'enum_variant'
  | 'variant_field';

export type Scope = 'global' | 'local';

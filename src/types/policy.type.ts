export const DISCRIMINANT_REPRS = ['u8', 'u16', 'u32', 'u64'] as const;

/** 判别值的定宽无符号整数类型 */
export type DiscriminantRepr = (typeof DISCRIMINANT_REPRS)[number];

/**
 * 判别值分配方式：
 * - by_order：声明顺序下标（从 0 开始）
 * - explicit：变体上显式给出的 value
 * - by_native_ordinal：变体自身序数按 repr 截断
 */
export type DiscriminantMode =
  | { kind: 'by_order' }
  | { kind: 'explicit'; value: bigint }
  | { kind: 'by_native_ordinal' };

/** 某一作用域解析完成后的编码策略（派生值，不可变） */
export interface EncodingPolicy {
  readonly codec_namespace: string;
  readonly skip: boolean;
  readonly discriminant_repr: DiscriminantRepr;
  readonly discriminant_mode: DiscriminantMode;
}

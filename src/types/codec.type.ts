/** ---------------------------
 *  值编解码协作方约定
 * ---------------------------*/

/** 输出端：写入全部字节并返回写入数 */
export interface ByteSink {
  write(bytes: Uint8Array): number;
}

/** 输入端：严格按序读取 n 字节；不足时抛 UNEXPECTED_EOF */
export interface ByteSource {
  read(n: number): Uint8Array;
}

/**
 * 单个值类型的编解码实现（递归基）。
 * encode 接收未校验的运行期值，由实现自行收窄。
 */
export interface ValueCodec<T = unknown> {
  encode(value: unknown, sink: ByteSink): number;
  decode(source: ByteSource): T;
  /** 提供默认值的类型才可用于 skip 位置 */
  default?: () => T;
}

/** 推导期只需知道"有没有"，不关心实现 */
export interface CodecCatalog {
  has_namespace(namespace: string): boolean;
  has_type(namespace: string, type_name: string): boolean;
  has_default(namespace: string, type_name: string): boolean;
}

/** 结构体值：字段 key → 值 */
export type StructValue = Record<string, unknown>;

/** 枚举值：变体名 + 字段 */
export interface EnumValue {
  variant: string;
  fields: Record<string, unknown>;
}

/** 结构化引擎错误（safe_decode 的失败分支） */
export interface EngineError {
  code: string;
  message: string;
  details?: unknown;
}

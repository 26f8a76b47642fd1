import type { EngineError } from '../types';

export type CodecErrorCode =
  | 'UNKNOWN_VARIANT'
  | 'UNEXPECTED_EOF'
  | 'DATA_NOT_ENTIRELY_CONSUMED'
  | 'VALUE_OUT_OF_RANGE'
  | 'INVALID_VALUE'
  | 'UNENCODABLE_VARIANT';

/**
 * 编解码期（处理实时数据时）的可恢复错误。
 * path 记录从最外层值到出错字段的 key 序列，由 engine 逐层补全。
 */
export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly details: Record<string, unknown>;
  readonly path: string[] = [];

  constructor(code: CodecErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CodecError';
    this.code = code;
    this.details = details;
  }

  /** 转成结构化的 EngineError（safe_decode 的失败分支） */
  to_engine_error(): EngineError {
    return {
      code: this.code,
      message: this.message,
      details: { ...this.details, path: [...this.path] },
    };
  }
}

/** 判别值未匹配任何变体；不会构造出任何部分变体 */
export class UnknownVariantError extends CodecError {
  readonly type_name: string;
  readonly raw_value: bigint;

  constructor(type_name: string, raw_value: bigint) {
    super('UNKNOWN_VARIANT', `enum '${type_name}' has no variant with discriminant ${raw_value}`, {
      type_name,
      raw_value: raw_value.toString(),
    });
    this.name = 'UnknownVariantError';
    this.type_name = type_name;
    this.raw_value = raw_value;
  }
}

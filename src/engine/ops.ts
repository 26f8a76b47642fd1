import { CodecError } from '../codecs/errors';
import { write_uint } from '../codecs/int.codec';
import type { DecodeOpType, EncodeOpType } from '../schema';
import type { ByteSink, ByteSource, ValueCodec } from '../types';

/** 编码一步的运行期上下文 */
export type EncodeFrame = {
  record: Record<string, unknown>;
  sink: ByteSink;
};

/** 解码一步的运行期上下文；out 只在全部成功后才交给调用者 */
export type DecodeFrame = {
  out: Record<string, unknown>;
  source: ByteSource;
};

export type EncodeStep = (frame: EncodeFrame) => number;
export type DecodeStep = (frame: DecodeFrame) => void;

/** 值类型名 → 编解码实现（命名空间已在绑定时确定） */
export type CodecLookup = (value_type: string) => ValueCodec;

/** 字段编解码失败时把 key 补到错误路径前；错误本身原样抛出 */
export function at_key<T>(key: string, run: () => T): T {
  try {
    return run();
  } catch (e) {
    if (e instanceof CodecError) e.path.unshift(key);
    throw e;
  }
}

/** 总是写成自有属性：`__proto__` 这样的合法字段名不能改动原型 */
function set_field(out: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(out, key, { value, enumerable: true, writable: true, configurable: true });
}

/** 只读自有属性；原型链上的同名成员视为缺失 */
function get_field(record: Record<string, unknown>, key: string): unknown {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** 绑定期解析 codec，运行期不再查表 */
export function bind_encode_op(op: EncodeOpType, lookup: CodecLookup): EncodeStep {
  switch (op.op) {
    case 'write_discriminant': {
      const value = BigInt(op.value);
      return (frame) => write_uint(op.repr, value, frame.sink);
    }
    case 'encode_field': {
      const codec = lookup(op.value_type);
      return (frame) => at_key(op.key, () => codec.encode(get_field(frame.record, op.key), frame.sink));
    }
  }
}

export function bind_decode_op(op: DecodeOpType, lookup: CodecLookup): DecodeStep {
  const codec = lookup(op.value_type);
  switch (op.op) {
    case 'decode_field':
      return (frame) => {
        set_field(frame.out, op.key, at_key(op.key, () => codec.decode(frame.source)));
      };
    case 'default_field': {
      const make_default = codec.default;
      if (!make_default) {
        throw new Error(`type '${op.value_type}' supplies no default for skipped field '${op.key}'`);
      }
      // 不消耗任何输入
      return (frame) => {
        set_field(frame.out, op.key, make_default());
      };
    }
  }
}

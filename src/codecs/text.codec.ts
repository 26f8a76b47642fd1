import type { ByteSink, ByteSource, ValueCodec } from '../types';
import { view_of } from './bytes.util';
import { CodecError } from './errors';

/** 长度前缀：u16 小端 */
const MAX_LEN = 0xffff;

function write_prefixed(type: string, payload: Uint8Array, sink: ByteSink): number {
  if (payload.length > MAX_LEN) {
    throw new CodecError('VALUE_OUT_OF_RANGE', `${type} of ${payload.length} bytes exceeds ${MAX_LEN}`, {
      type,
      length: payload.length,
    });
  }
  const prefix = new Uint8Array(2);
  view_of(prefix).setUint16(0, payload.length, true);
  return sink.write(prefix) + sink.write(payload);
}

function read_prefixed(source: ByteSource): Uint8Array {
  const len = view_of(source.read(2)).getUint16(0, true);
  return source.read(len);
}

export const string_codec: ValueCodec<string> = {
  encode(value, sink) {
    if (typeof value !== 'string') {
      throw new CodecError('INVALID_VALUE', `string expects a string, got ${typeof value}`, { type: 'string' });
    }
    return write_prefixed('string', new TextEncoder().encode(value), sink);
  },
  decode(source) {
    const bytes = read_prefixed(source);
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (e) {
      throw new CodecError('INVALID_VALUE', 'string is not valid UTF-8', {
        type: 'string',
        cause: e instanceof Error ? e.message : String(e),
      });
    }
  },
  default: () => '',
};

export const bytes_codec: ValueCodec<Uint8Array> = {
  encode(value, sink) {
    if (!(value instanceof Uint8Array)) {
      throw new CodecError('INVALID_VALUE', 'bytes expects a Uint8Array', { type: 'bytes' });
    }
    return write_prefixed('bytes', value, sink);
  },
  // 拷贝一份，避免与输入缓冲区共享内存
  decode: (source) => read_prefixed(source).slice(),
  default: () => new Uint8Array(0),
};

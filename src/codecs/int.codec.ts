import type { ByteSink, ByteSource, DiscriminantRepr, ValueCodec } from '../types';
import { view_of } from './bytes.util';
import { CodecError } from './errors';

type Width = 1 | 2 | 4 | 8;

export const REPR_WIDTH: Record<DiscriminantRepr, Width> = { u8: 1, u16: 2, u32: 4, u64: 8 };

/** repr 能表示的最大判别值 */
export function uint_max(repr: DiscriminantRepr): bigint {
  return (1n << BigInt(REPR_WIDTH[repr] * 8)) - 1n;
}

function put(width: Width, signed: boolean, value: bigint, sink: ByteSink): number {
  const bytes = new Uint8Array(width);
  const view = view_of(bytes);
  switch (width) {
    case 1:
      if (signed) view.setInt8(0, Number(value));
      else view.setUint8(0, Number(value));
      break;
    case 2:
      if (signed) view.setInt16(0, Number(value), true);
      else view.setUint16(0, Number(value), true);
      break;
    case 4:
      if (signed) view.setInt32(0, Number(value), true);
      else view.setUint32(0, Number(value), true);
      break;
    case 8:
      if (signed) view.setBigInt64(0, value, true);
      else view.setBigUint64(0, value, true);
      break;
  }
  return sink.write(bytes);
}

function take(width: Width, signed: boolean, source: ByteSource): bigint {
  const view = view_of(source.read(width));
  switch (width) {
    case 1:
      return BigInt(signed ? view.getInt8(0) : view.getUint8(0));
    case 2:
      return BigInt(signed ? view.getInt16(0, true) : view.getUint16(0, true));
    case 4:
      return BigInt(signed ? view.getInt32(0, true) : view.getUint32(0, true));
    case 8:
      return signed ? view.getBigInt64(0, true) : view.getBigUint64(0, true);
  }
}

/** 判别值：repr 宽度的小端无符号整数 */
export function write_uint(repr: DiscriminantRepr, value: bigint, sink: ByteSink): number {
  return put(REPR_WIDTH[repr], false, value, sink);
}

export function read_uint(repr: DiscriminantRepr, source: ByteSource): bigint {
  return take(REPR_WIDTH[repr], false, source);
}

function bounds(width: Width, signed: boolean): [bigint, bigint] {
  const bits = BigInt(width * 8);
  return signed ? [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n] : [0n, (1n << bits) - 1n];
}

function type_name(width: Width, signed: boolean): string {
  return `${signed ? 'i' : 'u'}${width * 8}`;
}

function to_bigint(value: unknown, width: Width, signed: boolean): bigint {
  const name = type_name(width, signed);
  let v: bigint;
  if (typeof value === 'bigint') {
    v = value;
  } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
    v = BigInt(value);
  } else {
    throw new CodecError('INVALID_VALUE', `${name} expects an integer, got ${typeof value}`, { type: name });
  }
  const [min, max] = bounds(width, signed);
  if (v < min || v > max) {
    throw new CodecError('VALUE_OUT_OF_RANGE', `${v} does not fit in ${name}`, { type: name, value: v.toString() });
  }
  return v;
}

/** 8/16/32 位整数：运行期值为 number */
export function small_int_codec(width: 1 | 2 | 4, signed: boolean): ValueCodec<number> {
  return {
    encode: (value, sink) => put(width, signed, to_bigint(value, width, signed), sink),
    decode: (source) => Number(take(width, signed, source)),
    default: () => 0,
  };
}

/** 64 位整数：运行期值为 bigint（编码时也接受安全整数 number） */
export function big_int_codec(signed: boolean): ValueCodec<bigint> {
  return {
    encode: (value, sink) => put(8, signed, to_bigint(value, 8, signed), sink),
    decode: (source) => take(8, signed, source),
    default: () => 0n,
  };
}

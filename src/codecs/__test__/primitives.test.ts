import { describe, it, expect } from 'vitest';

import { builtin_registry, STRICT_ENCODING } from '../registry';
import { ByteReader, ByteWriter } from '../bytes.util';
import { CodecError } from '../errors';
import type { ValueCodec } from '../../types';

const registry = builtin_registry();

function codec(type: string): ValueCodec {
  const c = registry.lookup(STRICT_ENCODING, type);
  if (!c) throw new Error(`missing builtin ${type}`);
  return c;
}

function encode(type: string, value: unknown): number[] {
  const w = new ByteWriter();
  codec(type).encode(value, w);
  return Array.from(w.finish());
}

function decode(type: string, bytes: number[]): unknown {
  return codec(type).decode(new ByteReader(Uint8Array.from(bytes)));
}

function code_of(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof CodecError) return e.code;
    throw e;
  }
  return undefined;
}

describe('strict_encoding integers', () => {
  it('writes little-endian fixed widths', () => {
    expect(encode('u8', 7)).toEqual([7]);
    expect(encode('u16', 0x1234)).toEqual([0x34, 0x12]);
    expect(encode('u32', 1)).toEqual([1, 0, 0, 0]);
    expect(encode('u64', 258n)).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
    expect(encode('i16', -2)).toEqual([0xfe, 0xff]);
  });

  it('reads them back with the runtime type of the width', () => {
    expect(decode('u16', [0x34, 0x12])).toBe(0x1234);
    expect(decode('i8', [0xff])).toBe(-1);
    expect(decode('u64', [2, 1, 0, 0, 0, 0, 0, 0])).toBe(258n);
    expect(decode('i64', [0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff])).toBe(-1n);
  });

  it('accepts a safe integer number for 64-bit types', () => {
    expect(encode('u64', 1)).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('rejects values outside the width', () => {
    expect(code_of(() => encode('u8', 256))).toBe('VALUE_OUT_OF_RANGE');
    expect(code_of(() => encode('u16', -1))).toBe('VALUE_OUT_OF_RANGE');
    expect(code_of(() => encode('i8', 128))).toBe('VALUE_OUT_OF_RANGE');
  });

  it('rejects non-integers', () => {
    expect(code_of(() => encode('u32', 1.5))).toBe('INVALID_VALUE');
    expect(code_of(() => encode('u32', '1'))).toBe('INVALID_VALUE');
  });

  it('fails on truncated input', () => {
    expect(code_of(() => decode('u32', [1, 2]))).toBe('UNEXPECTED_EOF');
  });
});

describe('strict_encoding bool', () => {
  it('encodes as a single byte', () => {
    expect(encode('bool', true)).toEqual([1]);
    expect(encode('bool', false)).toEqual([0]);
  });

  it('rejects any other byte on decode', () => {
    expect(code_of(() => decode('bool', [2]))).toBe('INVALID_VALUE');
  });
});

describe('strict_encoding floats', () => {
  it('writes IEEE-754 little-endian', () => {
    expect(encode('f32', 1)).toEqual([0, 0, 0x80, 0x3f]);
    expect(decode('f64', [0, 0, 0, 0, 0, 0, 0xf0, 0x3f])).toBe(1);
  });
});

describe('strict_encoding string / bytes', () => {
  it('prefixes the UTF-8 length as u16', () => {
    expect(encode('string', 'hi')).toEqual([2, 0, 0x68, 0x69]);
    expect(encode('string', 'é')).toEqual([2, 0, 0xc3, 0xa9]);
    expect(decode('string', [2, 0, 0x68, 0x69])).toBe('hi');
  });

  it('rejects invalid UTF-8', () => {
    expect(code_of(() => decode('string', [1, 0, 0xff]))).toBe('INVALID_VALUE');
  });

  it('fails when the prefix promises more than the input holds', () => {
    expect(code_of(() => decode('string', [5, 0, 0x61]))).toBe('UNEXPECTED_EOF');
  });

  it('rejects payloads longer than u16', () => {
    expect(code_of(() => encode('bytes', new Uint8Array(0x10000)))).toBe('VALUE_OUT_OF_RANGE');
  });

  it('copies decoded bytes', () => {
    const input = Uint8Array.of(2, 0, 9, 8);
    const out = codec('bytes').decode(new ByteReader(input));
    expect(out).toEqual(Uint8Array.of(9, 8));
    input[2] = 0;
    expect(out).toEqual(Uint8Array.of(9, 8));
  });
});

describe('CodecRegistry', () => {
  it('answers catalog queries', () => {
    expect(registry.has_namespace(STRICT_ENCODING)).toBe(true);
    expect(registry.has_namespace('other')).toBe(false);
    expect(registry.has_type(STRICT_ENCODING, 'u16')).toBe(true);
    expect(registry.has_type(STRICT_ENCODING, 'u128')).toBe(false);
    expect(registry.has_default(STRICT_ENCODING, 'string')).toBe(true);
  });

  it('reports no default for a codec without one', () => {
    const r = builtin_registry().define('custom', 'opaque', {
      encode: () => 0,
      decode: () => null,
    });
    expect(r.has_type('custom', 'opaque')).toBe(true);
    expect(r.has_default('custom', 'opaque')).toBe(false);
  });

  it('gives every builtin a default', () => {
    expect(codec('u64').default?.()).toBe(0n);
    expect(codec('bool').default?.()).toBe(false);
    expect(codec('string').default?.()).toBe('');
  });
});

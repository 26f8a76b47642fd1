import { describe, it, expect } from 'vitest';

import { ByteReader, ByteWriter } from './bytes.util';
import { CodecError } from './errors';

describe('ByteWriter', () => {
  it('grows past its initial capacity and keeps order', () => {
    const w = new ByteWriter();
    for (let i = 0; i < 100; i++) w.write(Uint8Array.of(i, i));
    const out = w.finish();
    expect(out.length).toBe(200);
    expect(w.length).toBe(200);
    expect(out[0]).toBe(0);
    expect(out[198]).toBe(99);
    expect(out[199]).toBe(99);
  });

  it('reports the byte count of each write', () => {
    const w = new ByteWriter();
    expect(w.write(Uint8Array.of(1, 2, 3))).toBe(3);
    expect(w.write(new Uint8Array(0))).toBe(0);
    expect(Array.from(w.finish())).toEqual([1, 2, 3]);
  });
});

describe('ByteReader', () => {
  it('reads strictly in order', () => {
    const r = new ByteReader(Uint8Array.of(1, 2, 3));
    expect(Array.from(r.read(2))).toEqual([1, 2]);
    expect(r.offset).toBe(2);
    expect(r.remaining).toBe(1);
    expect(Array.from(r.read(1))).toEqual([3]);
  });

  it('fails with UNEXPECTED_EOF without advancing', () => {
    const r = new ByteReader(Uint8Array.of(1));
    let caught: unknown;
    try {
      r.read(2);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CodecError);
    expect(caught instanceof CodecError && caught.code).toBe('UNEXPECTED_EOF');
    expect(r.offset).toBe(0);
  });
});

import type { ByteSink, ByteSource } from '../types';
import { CodecError } from './errors';

/** 可增长的内存输出端 */
export class ByteWriter implements ByteSink {
  private buf = new Uint8Array(64);
  private len = 0;

  write(bytes: Uint8Array): number {
    if (this.len + bytes.length > this.buf.length) {
      let cap = this.buf.length * 2;
      while (cap < this.len + bytes.length) cap *= 2;
      const next = new Uint8Array(cap);
      next.set(this.buf.subarray(0, this.len));
      this.buf = next;
    }
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
    return bytes.length;
  }

  get length(): number {
    return this.len;
  }

  /** 返回已写入内容的拷贝 */
  finish(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

/** 内存输入端：严格顺序读取，无回看 */
export class ByteReader implements ByteSource {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(n: number): Uint8Array {
    if (this.pos + n > this.bytes.length) {
      throw new CodecError('UNEXPECTED_EOF', `need ${n} byte(s), have ${this.remaining}`, {
        offset: this.pos,
        needed: n,
      });
    }
    const out = this.bytes.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }
}

/** 给一段字节包一个小端 DataView */
export function view_of(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Dense, growable bit buffer. Bits are packed most-significant-bit first
 * within each byte; unused trailing bits of the last byte stay zero.
 */

import type { EncodedPayload } from './types.js';

export type Bit = 0 | 1;

export class BitBuffer {
  private buf: Uint8Array;
  private len = 0;
  private frozen = false;

  constructor(capacityBits = 64) {
    this.buf = new Uint8Array(Math.max(1, Math.ceil(capacityBits / 8)));
  }

  static fromBits(bits: Iterable<Bit>): BitBuffer {
    const out = new BitBuffer();
    for (const b of bits) out.push(b);
    return out;
  }

  get length(): number {
    return this.len;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Refuse further writes; `clone()` still returns a writable copy. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  push(bit: Bit): void {
    this.assertWritable();
    this.reserve(this.len + 1);
    if (bit) this.buf[this.len >>> 3] |= 0x80 >>> (this.len & 7);
    this.len++;
  }

  /**
   * Append every bit of another buffer
   * @param other - Buffer whose bits are copied after ours
   */
  append(other: BitBuffer): void {
    this.assertWritable();
    this.reserve(this.len + other.len);
    const offset = this.len & 7;
    if (offset === 0) {
      // byte aligned: whole bytes copy straight across
      const bytes = Math.ceil(other.len / 8);
      this.buf.set(other.buf.subarray(0, bytes), this.len >>> 3);
      this.len += other.len;
      return;
    }
    const n = other.len;
    for (let i = 0; i < n; i++) this.push(other.get(i));
  }

  get(index: number): Bit {
    if (index < 0 || index >= this.len) throw new RangeError(`bit index ${index} out of range 0..${this.len - 1}`);
    return (this.buf[index >>> 3] >>> (7 - (index & 7))) & 1 ? 1 : 0;
  }

  /** True when every bit of this buffer matches the start of `other`. */
  isPrefixOf(other: BitBuffer): boolean {
    if (this.len > other.len) return false;
    for (let i = 0; i < this.len; i++) {
      if (this.get(i) !== other.get(i)) return false;
    }
    return true;
  }

  clone(): BitBuffer {
    const out = new BitBuffer(this.len);
    out.buf.set(this.buf.subarray(0, Math.ceil(this.len / 8)));
    out.len = this.len;
    return out;
  }

  /** Packed bytes, zero padded to a byte boundary */
  toBytes(): Uint8Array {
    return this.buf.slice(0, Math.ceil(this.len / 8));
  }

  toPayload(): EncodedPayload {
    return { bitLength: this.len, bytes: this.toBytes() };
  }

  toString(): string {
    let s = '';
    for (let i = 0; i < this.len; i++) s += this.get(i);
    return s;
  }

  private assertWritable(): void {
    if (this.frozen) throw new TypeError('BitBuffer is frozen');
  }

  private reserve(bits: number): void {
    const need = Math.ceil(bits / 8);
    if (need <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < need) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf);
    this.buf = next;
  }
}

/**
 * Sequential reader over packed bytes
 */
export class BitReader {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array, private readonly limit: number) {}

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.limit - this.pos;
  }

  next(): Bit {
    if (this.pos >= this.limit) throw new RangeError(`read past bit ${this.limit}`);
    const bit = (this.bytes[this.pos >>> 3] >>> (7 - (this.pos & 7))) & 1;
    this.pos++;
    return bit ? 1 : 0;
  }
}

/**
 * Persisted container: frequency table + bit length + packed payload.
 *
 * Layout (little-endian):
 *   'HUF1' | u32 k | k × (u16 symbol, u32 count) | u32 bitLength | payload bytes
 */

import type { CodeUnit, Container } from './types.js';
import { sortedEntries } from './frequency.js';
import { CorruptContainerError } from './errors.js';

export const CONTAINER_MAGIC = 'HUF1';
const HEADER = 8;
const ENTRY = 6;
const U32_MAX = 0xffffffff;

export function containerSize(container: Container): number {
  return HEADER + container.frequencies.size * ENTRY + 4 + container.payload.bytes.length;
}

export function encodeContainer(container: Container): Uint8Array {
  const entries = sortedEntries(container.frequencies);
  const { bitLength, bytes } = container.payload;
  if (bitLength > U32_MAX) throw new RangeError(`bit length ${bitLength} exceeds the container limit`);

  const tableEnd = HEADER + entries.length * ENTRY;
  const out = Buffer.alloc(tableEnd + 4 + bytes.length);
  out.write(CONTAINER_MAGIC, 0, 4, 'latin1');
  out.writeUInt32LE(entries.length, 4);
  let off = HEADER;
  for (const [symbol, count] of entries) {
    out.writeUInt16LE(symbol, off);
    out.writeUInt32LE(count, off + 2);
    off += ENTRY;
  }
  out.writeUInt32LE(bitLength, tableEnd);
  out.set(bytes, tableEnd + 4);
  return new Uint8Array(out.buffer, out.byteOffset, out.length);
}

/**
 * Parse a container record. The payload is whatever follows the header;
 * checking it against the bit length is left to the decoder.
 * @param data - Raw container bytes
 */
export function decodeContainer(data: Uint8Array): Container {
  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (buf.length < HEADER + 4) throw new CorruptContainerError(`Container is ${buf.length} bytes, too short for a header`, 0);
  if (buf.toString('latin1', 0, 4) !== CONTAINER_MAGIC) throw new CorruptContainerError('Bad magic', 0);

  const k = buf.readUInt32LE(4);
  const tableEnd = HEADER + k * ENTRY;
  if (tableEnd + 4 > buf.length) throw new CorruptContainerError(`Table of ${k} entries runs past the end of the record`, 4);

  const frequencies = new Map<CodeUnit, number>();
  for (let off = HEADER; off < tableEnd; off += ENTRY) {
    const symbol = buf.readUInt16LE(off);
    const count = buf.readUInt32LE(off + 2);
    if (count === 0) throw new CorruptContainerError('Zero count in frequency table', off + 2);
    if (frequencies.has(symbol)) throw new CorruptContainerError(`Duplicate symbol ${symbol}`, off);
    frequencies.set(symbol, count);
  }

  const bitLength = buf.readUInt32LE(tableEnd);
  const bytes = new Uint8Array(buf.subarray(tableEnd + 4));
  return { frequencies, payload: { bitLength, bytes } };
}

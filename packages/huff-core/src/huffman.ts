/**
 * Compress / decompress pipeline over whole in-memory texts
 */

import type { CompressionStats, Container } from './types.js';
import type { HuffmanTree } from './tree.js';
import type { CodeTable } from './codes.js';
import { countFrequencies, symbolsOf, textOf, totalCount } from './frequency.js';
import { buildTree } from './tree.js';
import { deriveCodes } from './codes.js';
import { encodeSymbols } from './encode.js';
import { decodePayload } from './decode.js';
import { containerSize, decodeContainer, encodeContainer } from './container.js';
import { MalformedStreamError } from './errors.js';

export interface CompressResult {
  container: Container;
  tree: HuffmanTree;
  codes: CodeTable;
  stats: CompressionStats;
}

/**
 * @param text - Input text
 * @param originalBytes - Size of the input as stored; defaults to its UTF-16 size
 */
export function compress(text: string, originalBytes = text.length * 2): CompressResult {
  const symbols = symbolsOf(text);
  const frequencies = countFrequencies(symbols);
  const tree = buildTree(frequencies);
  const codes = deriveCodes(tree);
  const payload = encodeSymbols(symbols, codes);
  const container: Container = { frequencies, payload };
  return { container, tree, codes, stats: compressionStats(text, container, originalBytes) };
}

/**
 * Rebuild the tree from the stored table and decode the payload
 * @param container - Parsed container
 * @returns Original text
 */
export function decompress(container: Container): string {
  const tree = buildTree(container.frequencies);
  const symbols = decodePayload(container.payload, tree);
  const expected = totalCount(container.frequencies);
  if (symbols.length !== expected) {
    throw new MalformedStreamError(`Decoded ${symbols.length} symbols, frequency table accounts for ${expected}`, container.payload.bitLength);
  }
  return textOf(symbols);
}

export function compressToBytes(text: string): Uint8Array {
  return encodeContainer(compress(text).container);
}

export function decompressBytes(data: Uint8Array): string {
  return decompress(decodeContainer(data));
}

export function compressionStats(text: string, container: Container, originalBytes = text.length * 2): CompressionStats {
  const symbols = text.length;
  const packedBytes = containerSize(container);
  const { bitLength } = container.payload;
  return {
    symbols,
    distinctSymbols: container.frequencies.size,
    originalBytes,
    packedBytes,
    bitLength,
    ratio: originalBytes > 0 ? packedBytes / originalBytes : 0,
    averageCodeLength: symbols > 0 ? bitLength / symbols : 0
  };
}

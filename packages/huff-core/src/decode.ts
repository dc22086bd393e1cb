/**
 * Bit-by-bit tree walk that turns a payload back into symbols
 */

import type { CodeUnit, EncodedPayload } from './types.js';
import type { HuffmanNode, HuffmanTree } from './tree.js';
import { BitReader } from './bits.js';
import { isLeaf } from './tree.js';
import { MalformedStreamError } from './errors.js';

/**
 * Decode the first `payload.bitLength` bits; padding past them is ignored
 * @param payload - Packed bits plus their logical length
 * @param tree - Tree rebuilt from the stored frequency table
 * @returns Decoded code units
 */
export function decodePayload(payload: EncodedPayload, tree: HuffmanTree): Uint16Array {
  const { bitLength, bytes } = payload;
  if (bytes.length * 8 < bitLength) {
    throw new MalformedStreamError(`Payload holds ${bytes.length * 8} bits, expected ${bitLength}`, bytes.length * 8);
  }
  if (bitLength === 0) return new Uint16Array(0);
  const rootId = tree.root;
  if (rootId === undefined) throw new MalformedStreamError('Bits present but the frequency table is empty', 0);

  const root = tree.nodes[rootId];
  const reader = new BitReader(bytes, bitLength);

  if (isLeaf(root)) {
    if (root.symbol === undefined) throw new MalformedStreamError('Leaf without a symbol', 0);
    return new Uint16Array(bitLength).fill(root.symbol);
  }

  const out: CodeUnit[] = [];
  let cursor = rootId;
  let pathStart = 0;
  while (reader.remaining > 0) {
    const at = reader.position;
    const node = tree.nodes[cursor];
    if (node.left === undefined || node.right === undefined) throw new MalformedStreamError('Internal node with a single child', at);
    const next = reader.next() === 0 ? node.left : node.right;
    const child: HuffmanNode | undefined = tree.nodes[next];
    if (child === undefined) throw new MalformedStreamError(`Node ${next} is outside the tree`, at);
    if (isLeaf(child)) {
      if (child.symbol === undefined) throw new MalformedStreamError('Leaf without a symbol', at);
      out.push(child.symbol);
      cursor = rootId;
      pathStart = reader.position;
    } else {
      cursor = next;
    }
  }
  if (cursor !== rootId) throw new MalformedStreamError('Bits ended mid-code', pathStart);

  return Uint16Array.from(out);
}

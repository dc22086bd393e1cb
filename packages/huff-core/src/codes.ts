/**
 * Code table derivation: root-to-leaf paths become prefix codes
 */

import type { CodeUnit, NodeId } from './types.js';
import type { HuffmanTree } from './tree.js';
import { BitBuffer } from './bits.js';
import { isLeaf } from './tree.js';

// Codes are frozen buffers shared by every caller of the table
export type CodeTable = ReadonlyMap<CodeUnit, BitBuffer>;

/**
 * Walk the tree depth first, appending 0 for a left step and 1 for a right step.
 * A root that is itself a leaf gets the one-bit code `0`.
 * @param tree - Tree built from the frequency table
 * @returns Code per leaf symbol; empty when the tree is empty
 */
export function deriveCodes(tree: HuffmanTree): CodeTable {
  const codes = new Map<CodeUnit, BitBuffer>();
  if (tree.root === undefined) return codes;

  const root = tree.nodes[tree.root];
  if (isLeaf(root)) {
    if (root.symbol !== undefined) codes.set(root.symbol, BitBuffer.fromBits([0]).freeze());
    return codes;
  }

  const stack: Array<{ id: NodeId; code: BitBuffer }> = [{ id: tree.root, code: new BitBuffer() }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    const node = tree.nodes[top.id];
    if (isLeaf(node)) {
      if (node.symbol !== undefined) codes.set(node.symbol, top.code.freeze());
      continue;
    }
    // right pushed first so the left subtree is visited first
    if (node.right !== undefined) {
      const code = top.code.clone();
      code.push(1);
      stack.push({ id: node.right, code });
    }
    if (node.left !== undefined) {
      const code = top.code.clone();
      code.push(0);
      stack.push({ id: node.left, code });
    }
  }
  return codes;
}

export function codeLengths(codes: CodeTable): Map<CodeUnit, number> {
  const out = new Map<CodeUnit, number>();
  for (const [s, c] of codes) out.set(s, c.length);
  return out;
}

// Printable view, keyed by the character itself, in ascending symbol order
export function describeCodes(codes: CodeTable): Record<string, string> {
  const out: Record<string, string> = {};
  for (const s of [...codes.keys()].sort((a, b) => a - b)) {
    const code = codes.get(s);
    if (code) out[String.fromCharCode(s)] = code.toString();
  }
  return out;
}

/**
 * Huffman tree construction over a flat node arena
 */

import type { CodeUnit, FrequencyTable, NodeId } from './types.js';
import { MinHeap } from './heap.js';
import { sortedEntries } from './frequency.js';

/**
 * Arena entry. A leaf carries a symbol and no children; an internal node
 * carries two child ids and the sum of their weights.
 */
export interface HuffmanNode {
  weight: number;
  symbol?: CodeUnit;
  left?: NodeId;
  right?: NodeId;
}

export interface HuffmanTree {
  nodes: readonly HuffmanNode[];
  root: NodeId | undefined;   // undefined for an empty table
}

export function isLeaf(node: HuffmanNode): boolean {
  return node.left === undefined && node.right === undefined;
}

/**
 * Build the tree by repeatedly merging the two lightest nodes.
 *
 * Leaves enter the arena in ascending symbol order, so a node's id doubles as
 * its insertion sequence. The heap orders by weight, then by id: among equal
 * weights the earliest inserted node comes out first. The first node removed
 * becomes the left child, the second the right. Building twice from the same
 * table therefore gives the same tree, whatever order the map was filled in.
 *
 * @param table - Symbol frequencies
 * @returns Tree whose root is undefined (no symbols), a leaf (one symbol), or internal
 */
export function buildTree(table: FrequencyTable): HuffmanTree {
  const nodes: HuffmanNode[] = [];
  const heap = new MinHeap<NodeId>((a, b) => nodes[a].weight - nodes[b].weight || a - b);

  for (const [symbol, weight] of sortedEntries(table)) {
    nodes.push({ weight, symbol });
    heap.push(nodes.length - 1);
  }

  while (heap.size > 1) {
    const left = heap.pop();
    const right = heap.pop();
    if (left === undefined || right === undefined) break;
    nodes.push({ weight: nodes[left].weight + nodes[right].weight, left, right });
    heap.push(nodes.length - 1);
  }

  return { nodes, root: heap.pop() };
}

export function leafCount(tree: HuffmanTree): number {
  return tree.nodes.filter(isLeaf).length;
}

/**
 * Longest root-to-leaf path; 0 for an empty or single-leaf tree
 */
export function treeDepth(tree: HuffmanTree): number {
  if (tree.root === undefined) return 0;
  let max = 0;
  const stack: Array<[NodeId, number]> = [[tree.root, 0]];
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    const [id, depth] = top;
    const n = tree.nodes[id];
    if (depth > max) max = depth;
    if (n.left !== undefined) stack.push([n.left, depth + 1]);
    if (n.right !== undefined) stack.push([n.right, depth + 1]);
  }
  return max;
}

/**
 * Symbol frequency tabulation
 */

import type { CodeUnit, FrequencyTable } from './types.js';

/**
 * Count occurrences of every code unit in one pass
 * @param symbols - Input code units
 * @returns Table with an entry for each symbol present, none for absent ones
 */
export function countFrequencies(symbols: ArrayLike<CodeUnit>): FrequencyTable {
  const freq = new Map<CodeUnit, number>();
  for (let i = 0; i < symbols.length; i++) {
    const s = symbols[i];
    freq.set(s, (freq.get(s) ?? 0) + 1);
  }
  return freq;
}

export function totalCount(table: FrequencyTable): number {
  let total = 0;
  for (const c of table.values()) total += c;
  return total;
}

// Entries in ascending symbol order; the canonical order for trees and containers
export function sortedEntries(table: FrequencyTable): Array<[CodeUnit, number]> {
  return [...table.entries()].sort((a, b) => a[0] - b[0]);
}

export function symbolsOf(text: string): Uint16Array {
  const out = new Uint16Array(text.length);
  for (let i = 0; i < text.length; i++) out[i] = text.charCodeAt(i);
  return out;
}

const CHUNK = 0x2000;

export function textOf(symbols: ArrayLike<CodeUnit>): string {
  const parts: string[] = [];
  for (let i = 0; i < symbols.length; i += CHUNK) {
    const end = Math.min(i + CHUNK, symbols.length);
    const slice: number[] = [];
    for (let j = i; j < end; j++) slice.push(symbols[j]);
    parts.push(String.fromCharCode(...slice));
  }
  return parts.join('');
}

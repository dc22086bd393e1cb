import pkg from 'roaring';
const { RoaringBitmap32 } = pkg;
import type { CodeUnit, DocID } from './types.js';
import type { ContainerStore } from './store.js';

type RoaringBitmap = InstanceType<typeof RoaringBitmap32>;

export interface SymbolIndex {
  symbolToDocs: Map<CodeUnit, RoaringBitmap>;
  docToSymbols: Map<DocID, RoaringBitmap>;
  totalDocs: number;
}

export function createSymbolIndex(): SymbolIndex {
  return {
    symbolToDocs: new Map(),
    docToSymbols: new Map(),
    totalDocs: 0
  };
}

export function addSymbolToDoc(index: SymbolIndex, symbol: CodeUnit, doc: DocID): void {
  let docs = index.symbolToDocs.get(symbol);
  if (!docs) {
    docs = new RoaringBitmap32();
    index.symbolToDocs.set(symbol, docs);
  }
  docs.add(doc);

  let symbols = index.docToSymbols.get(doc);
  if (!symbols) {
    symbols = new RoaringBitmap32();
    index.docToSymbols.set(doc, symbols);
  }
  symbols.add(symbol);
}

export function getDocsForSymbol(index: SymbolIndex, symbol: CodeUnit): number[] {
  const bitmap = index.symbolToDocs.get(symbol);
  return bitmap ? Array.from(bitmap) : [];
}

export function getSymbolsForDoc(index: SymbolIndex, doc: DocID): number[] {
  const bitmap = index.docToSymbols.get(doc);
  return bitmap ? Array.from(bitmap) : [];
}

/**
 * Documents containing every one of the symbols
 */
export function intersectSymbolDocs(index: SymbolIndex, symbols: CodeUnit[]): number[] {
  if (symbols.length === 0) return [];

  const bitmaps: RoaringBitmap[] = [];
  for (const s of symbols) {
    const bitmap = index.symbolToDocs.get(s);
    // a symbol no document contains empties the intersection
    if (!bitmap) return [];
    bitmaps.push(bitmap);
  }

  const result = bitmaps[0].clone();
  for (let i = 1; i < bitmaps.length; i++) {
    result.andInPlace(bitmaps[i]);
  }

  return Array.from(result);
}

/**
 * Documents containing at least one of the symbols
 */
export function unionSymbolDocs(index: SymbolIndex, symbols: CodeUnit[]): number[] {
  const result = new RoaringBitmap32();
  for (const s of symbols) {
    const bitmap = index.symbolToDocs.get(s);
    if (bitmap) result.orInPlace(bitmap);
  }
  return Array.from(result);
}

// Reads only the frequency tables; payloads are never decoded
export function buildSymbolIndexFromStore(store: ContainerStore): SymbolIndex {
  const index = createSymbolIndex();

  for (const { doc } of store.list()) {
    const container = store.containerAt(doc);
    if (!container) continue;
    index.docToSymbols.set(doc, new RoaringBitmap32());
    for (const symbol of container.frequencies.keys()) {
      addSymbolToDoc(index, symbol, doc);
    }
  }

  index.totalDocs = index.docToSymbols.size;
  return index;
}

export function indexStats(index: SymbolIndex): {
  totalSymbols: number;
  totalDocs: number;
  avgSymbolsPerDoc: number;
  avgDocsPerSymbol: number;
} {
  const totalSymbols = index.symbolToDocs.size;
  const totalDocs = index.totalDocs;

  const totalPairs = Array.from(index.symbolToDocs.values())
    .reduce((sum, bitmap) => sum + bitmap.size, 0);

  const avgSymbolsPerDoc = totalDocs > 0 ? totalPairs / totalDocs : 0;
  const avgDocsPerSymbol = totalSymbols > 0 ? totalPairs / totalSymbols : 0;

  return {
    totalSymbols,
    totalDocs,
    avgSymbolsPerDoc,
    avgDocsPerSymbol
  };
}

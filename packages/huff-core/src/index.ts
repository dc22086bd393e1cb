export * from './types.js';
export * from './errors.js';
export * from './bits.js';
export * from './frequency.js';
export * from './heap.js';
export * from './tree.js';
export * from './codes.js';
export * from './encode.js';
export * from './decode.js';
export * from './container.js';
export * from './huffman.js';
export * from './io.js';
export * from './store.js';
export * from './bitmap.js';

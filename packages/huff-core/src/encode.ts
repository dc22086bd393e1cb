import type { CodeUnit, EncodedPayload } from './types.js';
import type { CodeTable } from './codes.js';
import { BitBuffer } from './bits.js';
import { MissingCodeError } from './errors.js';

/**
 * Concatenate the code of every input symbol, in order and without separators
 * @param symbols - Input code units
 * @param codes - Prefix codes derived from the same input's frequencies
 * @returns Packed bits and their logical length
 */
export function encodeSymbols(symbols: ArrayLike<CodeUnit>, codes: CodeTable): EncodedPayload {
  let bits = 0;
  for (let i = 0; i < symbols.length; i++) {
    const code = codes.get(symbols[i]);
    if (!code) throw new MissingCodeError(symbols[i], i);
    bits += code.length;
  }

  const out = new BitBuffer(bits);
  for (let i = 0; i < symbols.length; i++) {
    const code = codes.get(symbols[i]);
    if (code) out.append(code);
  }
  return out.toPayload();
}

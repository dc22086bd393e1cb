import { describe, it, expect } from 'vitest';
import { buildTree } from '../src/tree.js';
import type { HuffmanTree } from '../src/tree.js';
import { deriveCodes } from '../src/codes.js';
import { encodeSymbols } from '../src/encode.js';
import { decodePayload } from '../src/decode.js';
import { countFrequencies, symbolsOf, textOf } from '../src/frequency.js';
import { MalformedStreamError, MissingCodeError } from '../src/errors.js';

function setup(text: string) {
  const symbols = symbolsOf(text);
  const tree = buildTree(countFrequencies(symbols));
  return { symbols, tree, codes: deriveCodes(tree) };
}

describe('encodeSymbols', () => {
  it('concatenates codes without separators', () => {
    const { symbols, codes } = setup('abracadabra');
    const payload = encodeSymbols(symbols, codes);
    expect(payload.bitLength).toBe(23);
    expect(Array.from(payload.bytes)).toEqual([0x6e, 0x8a, 0xdc]);
  });

  it('encodes a single repeated symbol with one bit each', () => {
    const { symbols, codes } = setup('aaaa');
    const payload = encodeSymbols(symbols, codes);
    expect(payload.bitLength).toBe(4);
    expect(Array.from(payload.bytes)).toEqual([0x00]);
  });

  it('encodes nothing to an empty payload', () => {
    const { symbols, codes } = setup('');
    expect(encodeSymbols(symbols, codes)).toEqual({ bitLength: 0, bytes: new Uint8Array(0) });
  });

  it('throws MissingCodeError naming the symbol and its position', () => {
    const { codes } = setup('ab');
    try {
      encodeSymbols(symbolsOf('abz'), codes);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MissingCodeError);
      if (e instanceof MissingCodeError) {
        expect(e.symbol).toBe(122);
        expect(e.position).toBe(2);
        expect(e.code).toBe('MISSING_CODE');
      }
    }
  });
});

describe('decodePayload', () => {
  it('walks the tree back to the original symbols', () => {
    const { tree } = setup('abracadabra');
    const out = decodePayload({ bitLength: 23, bytes: new Uint8Array([0x6e, 0x8a, 0xdc]) }, tree);
    expect(textOf(out)).toBe('abracadabra');
  });

  it('ignores set padding bits beyond the bit length', () => {
    const { tree } = setup('abracadabra');
    const out = decodePayload({ bitLength: 23, bytes: new Uint8Array([0x6e, 0x8a, 0xdd]) }, tree);
    expect(textOf(out)).toBe('abracadabra');
  });

  it('emits the single leaf once per bit', () => {
    const { tree } = setup('aaaa');
    expect(textOf(decodePayload({ bitLength: 4, bytes: new Uint8Array([0]) }, tree))).toBe('aaaa');
  });

  it('decodes an empty payload with an empty tree', () => {
    const { tree } = setup('');
    expect(decodePayload({ bitLength: 0, bytes: new Uint8Array(0) }, tree)).toHaveLength(0);
  });

  it('rejects bits when the tree is empty', () => {
    const { tree } = setup('');
    expect(() => decodePayload({ bitLength: 3, bytes: new Uint8Array([0]) }, tree)).toThrow(MalformedStreamError);
  });

  it('rejects a payload shorter than its bit length', () => {
    const { tree } = setup('abracadabra');
    try {
      decodePayload({ bitLength: 23, bytes: new Uint8Array([0x6e, 0x8a]) }, tree);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedStreamError);
      if (e instanceof MalformedStreamError) expect(e.bitPosition).toBe(16);
    }
  });

  it('rejects bits that end in the middle of a code', () => {
    const { tree } = setup('abracadabra');
    // '0' decodes 'a', then '11' stops inside 'b' or 'r'
    try {
      decodePayload({ bitLength: 3, bytes: new Uint8Array([0b01100000]) }, tree);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedStreamError);
      if (e instanceof MalformedStreamError) expect(e.bitPosition).toBe(1);
    }
  });

  it('rejects a child id outside the arena', () => {
    const tree: HuffmanTree = {
      nodes: [{ weight: 1, symbol: 97 }, { weight: 2, left: 0, right: 5 }],
      root: 1
    };
    try {
      decodePayload({ bitLength: 1, bytes: new Uint8Array([0b10000000]) }, tree);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedStreamError);
      if (e instanceof MalformedStreamError) {
        expect(e.bitPosition).toBe(0);
        expect(e.message).toBe('Node 5 is outside the tree (bit 0)');
      }
    }
  });

  it('rejects a node with only one child', () => {
    const tree: HuffmanTree = {
      nodes: [{ weight: 1, symbol: 97 }, { weight: 1, left: 0 }],
      root: 1
    };
    try {
      decodePayload({ bitLength: 2, bytes: new Uint8Array([0b00000000]) }, tree);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedStreamError);
      if (e instanceof MalformedStreamError) expect(e.bitPosition).toBe(0);
    }
  });
});

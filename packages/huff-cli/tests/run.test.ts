import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CLI_OPTIONS, parseArgs, run, UsageError } from '../src/run.js';

describe('parseArgs', () => {
  it('separates positionals from flags', () => {
    const { positional, options } = parseArgs(['in.txt', '--lines', 'out.huff', '--store', 'x.db', '--and']);
    expect(positional).toEqual(['in.txt', 'out.huff']);
    expect(options).toEqual({ lines: true, json: false, store: 'x.db', mode: 'intersection' });
  });

  it('falls back to the defaults', () => {
    expect(parseArgs([]).options).toEqual(DEFAULT_CLI_OPTIONS);
  });

  it('rejects unknown flags', () => {
    expect(() => parseArgs(['--fast'])).toThrow(UsageError);
    expect(() => parseArgs(['--store'])).toThrow('--store needs a path');
  });
});

describe('run', () => {
  let dir: string;
  let log: MockInstance;
  let err: MockInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'huff-cli-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    err = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const file = (name: string) => path.join(dir, name);

  it('compresses then decompresses a file', () => {
    fs.writeFileSync(file('sample.txt'), 'abracadabra');
    expect(run(['compress', file('sample.txt'), file('sample.huff')])).toBe(0);
    expect(fs.statSync(file('sample.huff')).size).toBe(45);
    // 45 container bytes for an 11 byte file
    expect(log).toHaveBeenCalledWith(`File compressed to ${file('sample.huff')} (45 bytes, ratio 4.091)`);
    expect(run(['decompress', file('sample.huff'), file('out/sample.txt')])).toBe(0);
    expect(fs.readFileSync(file('out/sample.txt'), 'utf8')).toBe('abracadabra');
    expect(log).toHaveBeenLastCalledWith(`File decompressed to ${file('out/sample.txt')}`);
  });

  it('re-terminates lines with --lines', () => {
    fs.writeFileSync(file('lines.txt'), 'one\r\ntwo');
    expect(run(['compress', file('lines.txt'), file('lines.huff'), '--lines'])).toBe(0);
    expect(run(['decompress', file('lines.huff'), file('lines.out')])).toBe(0);
    expect(fs.readFileSync(file('lines.out'), 'utf8')).toBe('one\ntwo\n');
  });

  it('refuses input that is not valid UTF-8 instead of altering it', () => {
    fs.writeFileSync(file('latin1.txt'), Uint8Array.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));
    expect(run(['roundtrip', file('latin1.txt')])).toBe(1);
    expect(String(err.mock.lastCall?.[0])).toMatch(/^IO_ERROR: Cannot read /);
    expect(run(['compress', file('latin1.txt'), file('latin1.huff')])).toBe(1);
    expect(fs.existsSync(file('latin1.huff'))).toBe(false);
  });

  it('verifies a round trip in memory', () => {
    fs.writeFileSync(file('rt.txt'), 'aaaa');
    expect(run(['roundtrip', file('rt.txt')])).toBe(0);
    expect(log).toHaveBeenCalledWith('Round trip OK: 4 symbols -> 19 bytes');
  });

  it('inspects a container', () => {
    fs.writeFileSync(file('i.txt'), 'aabbbc');
    run(['compress', file('i.txt'), file('i.huff')]);
    expect(run(['inspect', file('i.huff'), '--json'])).toBe(0);
    expect(JSON.parse(String(log.mock.lastCall?.[0]))).toEqual({
      bitLength: 9,
      payloadBytes: 2,
      depth: 2,
      frequencies: [
        { symbol: 'a', code: 97, count: 2 },
        { symbol: 'b', code: 98, count: 3 },
        { symbol: 'c', code: 99, count: 1 }
      ],
      codes: { a: '11', b: '0', c: '10' }
    });
  });

  it('reports stats for every text file in a folder', () => {
    fs.mkdirSync(file('docs'));
    fs.writeFileSync(file('docs/b.md'), 'aaaa');
    fs.writeFileSync(file('docs/a.txt'), 'abracadabra');
    fs.writeFileSync(file('docs/skip.bin'), 'zz');
    expect(run(['stats', file('docs'), '--json'])).toBe(0);
    const rows = JSON.parse(String(log.mock.lastCall?.[0])) as Array<{ file: string; bitLength: number }>;
    expect(rows.map(r => [path.basename(r.file), r.bitLength])).toEqual([['a.txt', 23], ['b.md', 4]]);
  });

  it('ingests into the store and queries it', () => {
    fs.mkdirSync(file('docs'));
    fs.writeFileSync(file('docs/a.txt'), 'abc');
    fs.writeFileSync(file('docs/b.txt'), 'bcd');
    const db = file('huff.db');
    expect(run(['ingest', file('docs'), '--store', db])).toBe(0);
    expect(run(['query', 'ad', '--and', '--store', db, '--json'])).toBe(0);
    expect(JSON.parse(String(log.mock.lastCall?.[0])).docs).toEqual([]);
    expect(run(['query', 'ad', '--store', db, '--json'])).toBe(0);
    const names = (JSON.parse(String(log.mock.lastCall?.[0])).docs as Array<{ name: string }>).map(d => path.basename(d.name));
    expect(names).toEqual(['a.txt', 'b.txt']);
  });

  it('fails a query against a store that does not exist', () => {
    const db = file('missing.db');
    expect(run(['query', 'a', '--store', db])).toBe(1);
    expect(String(err.mock.lastCall?.[0])).toMatch(/^IO_ERROR: Cannot read /);
    expect(fs.existsSync(db)).toBe(false);
  });

  it('reports codec errors with their code and exits 1', () => {
    fs.writeFileSync(file('bad.huff'), 'not a container');
    expect(run(['decompress', file('bad.huff'), file('x.txt')])).toBe(1);
    expect(err).toHaveBeenCalledWith('CORRUPT_CONTAINER: Bad magic (byte 0)');
  });

  it('reports missing files as IO errors', () => {
    expect(run(['compress', file('missing.txt'), file('x.huff')])).toBe(1);
    expect(String(err.mock.lastCall?.[0])).toMatch(/^IO_ERROR: Cannot read /);
  });

  it('prints usage for unknown commands', () => {
    expect(run(['explode'])).toBe(1);
    expect(err).toHaveBeenCalledWith('Unknown command: explode');
    expect(run([])).toBe(1);
  });
});

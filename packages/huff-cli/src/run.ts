import fs from 'node:fs'; import path from 'node:path'; import { glob } from 'glob';
import {
  compress, decompress, decodeContainer, encodeContainer, describeCodes, deriveCodes, buildTree, treeDepth,
  readInput, readBytes, writeOutput, symbolsOf, sortedEntries, openStore, isHuffError,
  buildSymbolIndexFromStore, intersectSymbolDocs, unionSymbolDocs, indexStats, IOError
} from '@huffpack/huff-core';

export interface CliOptions {
  lines: boolean;
  json: boolean;
  store: string;
  mode: 'union' | 'intersection';
}

export const DEFAULT_CLI_OPTIONS: CliOptions = {
  lines: false,
  json: false,
  store: 'huff.db',
  mode: 'union'
};

export class UsageError extends Error {
  constructor(message: string) { super(message); this.name = 'UsageError'; }
}

export function usage(){console.log(`Usage:
  huff compress <input> <output> [--lines]
  huff decompress <input> <output>
  huff roundtrip <input> [--lines]
  huff inspect <container>
  huff stats <input...> [--lines] [--json]
  huff ingest <folder-or-files...> [--store <db>] [--lines]
  huff query "<chars>" [--and|--or] [--store <db>] [--json]

Options:
  --lines                 Read input line by line, ending every line with \\n
  --json                  Output as JSON (default: pretty-printed)
  --store <db>            Container store database (default: huff.db)
  --and, --intersection   Documents containing all of the characters
  --or, --union           Documents containing any of the characters (default)`);}

export function parseArgs(args: string[]): { positional: string[]; options: CliOptions } {
  const options: CliOptions = { ...DEFAULT_CLI_OPTIONS };
  const positional: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      switch (arg) {
        case '--lines':
          options.lines = true;
          break;
        case '--json':
          options.json = true;
          break;
        case '--store': {
          const value = args[++i];
          if (!value) throw new UsageError('--store needs a path');
          options.store = value;
          break;
        }
        case '--and':
        case '--intersection':
          options.mode = 'intersection';
          break;
        case '--or':
        case '--union':
          options.mode = 'union';
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
    } else {
      positional.push(arg);
    }
    i++;
  }

  return { positional, options };
}

// Directories expand to their **/*.{txt,md} files
function expandInputs(args: string[]): string[] {
  const inputs: string[] = [];
  for (const a of args) {
    let st: fs.Stats;
    try { st = fs.statSync(a); } catch (e) { throw new IOError('read', a, e); }
    if (st.isDirectory()) {
      const files = glob.sync('**/*.{txt,md}', { cwd: a, nodir: true }).sort();
      for (const f of files) inputs.push(path.join(a, f));
    } else {
      inputs.push(a);
    }
  }
  return inputs;
}

// Ratios are reported against the UTF-8 size the text has on disk
function utf8Size(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function print(value: unknown, json: boolean) {
  console.log(json ? JSON.stringify(value) : JSON.stringify(value, null, 2));
}

/**
 * Execute one CLI invocation
 * @param argv - Arguments after the program name
 * @returns Process exit code
 */
export function run(argv: string[]): number {
  const [cmd, ...rest] = argv;
  if (!cmd) { usage(); return 1; }
  try {
    const { positional, options } = parseArgs(rest);
    return dispatch(cmd, positional, options);
  } catch (e) {
    if (e instanceof UsageError) { console.error(e.message); usage(); return 1; }
    if (isHuffError(e)) { console.error(`${e.code}: ${e.message}`); return 1; }
    throw e;
  }
}

function dispatch(cmd: string, args: string[], options: CliOptions): number {
  if(cmd==='compress'){
    const [input, output] = args;
    if(!input || !output) throw new UsageError('compress needs <input> <output>');
    const text = readInput(input, { lines: options.lines });
    const { container, stats } = compress(text, utf8Size(text));
    writeOutput(output, encodeContainer(container));
    console.log(`File compressed to ${output} (${stats.packedBytes} bytes, ratio ${stats.ratio.toFixed(3)})`);
    return 0;
  }

  if(cmd==='decompress'){
    const [input, output] = args;
    if(!input || !output) throw new UsageError('decompress needs <input> <output>');
    const text = decompress(decodeContainer(readBytes(input)));
    writeOutput(output, text);
    console.log(`File decompressed to ${output}`);
    return 0;
  }

  if(cmd==='roundtrip'){
    const [input] = args;
    if(!input) throw new UsageError('roundtrip needs <input>');
    const text = readInput(input, { lines: options.lines });
    const bytes = encodeContainer(compress(text).container);
    const restored = decompress(decodeContainer(bytes));
    if (restored !== text) {
      console.error(`Round trip mismatch for ${input}`);
      return 1;
    }
    console.log(`Round trip OK: ${text.length} symbols -> ${bytes.length} bytes`);
    return 0;
  }

  if(cmd==='inspect'){
    const [input] = args;
    if(!input) throw new UsageError('inspect needs <container>');
    const container = decodeContainer(readBytes(input));
    const tree = buildTree(container.frequencies);
    const frequencies = sortedEntries(container.frequencies).map(([s, count]) => ({ symbol: String.fromCharCode(s), code: s, count }));
    print({
      bitLength: container.payload.bitLength,
      payloadBytes: container.payload.bytes.length,
      depth: treeDepth(tree),
      frequencies,
      codes: describeCodes(deriveCodes(tree))
    }, options.json);
    return 0;
  }

  if(cmd==='stats'){
    if(args.length===0) throw new UsageError('stats needs at least one input');
    const results = expandInputs(args).map(file => {
      const text = readInput(file, { lines: options.lines });
      return { file, ...compress(text, utf8Size(text)).stats };
    });
    print(results, options.json);
    return 0;
  }

  if(cmd==='ingest'){
    if(args.length===0) throw new UsageError('ingest needs <folder-or-files...>');
    const entries = expandInputs(args).map(file => {
      const text = readInput(file, { lines: options.lines });
      return { name: file, container: compress(text).container, originalSize: utf8Size(text) };
    });
    const store = openStore(options.store);
    try {
      const docs = store.batchContainers(entries);
      console.log('Ingest complete:', { docs: docs.length, stored: store.count(), store: options.store });
    } finally {
      store.close();
    }
    return 0;
  }

  if(cmd==='query'){
    const query = args.join(' ');
    if(!query) throw new UsageError('query needs "<chars>"');
    const symbols = [...new Set(symbolsOf(query))];
    const store = openStore(options.store, { readonly: true });
    try {
      const index = buildSymbolIndexFromStore(store);
      const docs = options.mode === 'intersection'
        ? intersectSymbolDocs(index, symbols)
        : unionSymbolDocs(index, symbols);
      print({
        query,
        mode: options.mode,
        docs: docs.map(d => ({ doc: d, name: store.docName(d) })),
        index: indexStats(index)
      }, options.json);
    } finally {
      store.close();
    }
    return 0;
  }

  throw new UsageError(`Unknown command: ${cmd}`);
}

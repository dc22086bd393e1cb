/**
 * Whole-file collaborators: read all input into memory, write all output from memory
 */

import fs from 'node:fs';
import path from 'node:path';
import { IOError } from './errors.js';

export interface ReadOptions {
  lines?: boolean;   // re-terminate every line with '\n'
}

/**
 * Read a file as UTF-8 text; bytes that are not valid UTF-8 raise IOError
 * @param file - Path to read
 * @param options - With `lines`, each line (split on \n, \r\n or \r) ends in '\n', the last one included
 */
export function readInput(file: string, options: ReadOptions = {}): string {
  const bytes = readBytes(file);
  let text: string;
  try {
    // fatal: invalid UTF-8 is refused rather than replaced with U+FFFD; a BOM is kept as data
    text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (e) {
    throw new IOError('read', file, e);
  }
  return options.lines ? toLines(text) : text;
}

export function toLines(text: string): string {
  if (text.length === 0) return '';
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map(l => l + '\n').join('');
}

export function readBytes(file: string): Uint8Array {
  try {
    return new Uint8Array(fs.readFileSync(file));
  } catch (e) {
    throw new IOError('read', file, e);
  }
}

export function writeOutput(file: string, data: string | Uint8Array): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, data);
  } catch (e) {
    throw new IOError('write', file, e);
  }
}

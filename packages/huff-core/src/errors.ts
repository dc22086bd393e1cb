/**
 * Error taxonomy for the Huffman codec
 */

export type HuffErrorCode = 'MISSING_CODE' | 'MALFORMED_STREAM' | 'CORRUPT_CONTAINER' | 'IO_ERROR';

/**
 * Base class for every failure raised by the codec and its file collaborators.
 * `details` carries the diagnostic position (bit offset, byte offset, symbol, path).
 */
export class HuffError extends Error {
  public readonly code: HuffErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: HuffErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HuffError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

/** A symbol in the input has no entry in the code table. */
export class MissingCodeError extends HuffError {
  public readonly symbol: number;
  public readonly position: number;

  constructor(symbol: number, position: number) {
    super('MISSING_CODE', `No code for symbol U+${symbol.toString(16).toUpperCase().padStart(4, '0')} at position ${position}`, { symbol, position });
    this.name = 'MissingCodeError';
    this.symbol = symbol;
    this.position = position;
  }
}

/** The encoded bits cannot be resolved against the tree. */
export class MalformedStreamError extends HuffError {
  public readonly bitPosition: number;

  constructor(message: string, bitPosition: number) {
    super('MALFORMED_STREAM', `${message} (bit ${bitPosition})`, { bitPosition });
    this.name = 'MalformedStreamError';
    this.bitPosition = bitPosition;
  }
}

export class CorruptContainerError extends HuffError {
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super('CORRUPT_CONTAINER', `${message} (byte ${offset})`, { offset });
    this.name = 'CorruptContainerError';
    this.offset = offset;
  }
}

// Wraps a file-system failure; the original error stays on `cause`
export class IOError extends HuffError {
  public readonly path: string;
  public readonly operation: 'read' | 'write';

  constructor(operation: 'read' | 'write', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('IO_ERROR', `Cannot ${operation} ${path}: ${reason}`, { path, operation }, { cause });
    this.name = 'IOError';
    this.path = path;
    this.operation = operation;
  }
}

export function isHuffError(error: unknown): error is HuffError {
  return error instanceof HuffError;
}

export function isHuffErrorCode(error: unknown, code: HuffErrorCode): boolean {
  return isHuffError(error) && error.code === code;
}

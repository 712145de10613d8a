/**
 * Error types
 *
 * Every failure raised while reading, decoding, encoding or writing a KiCad file
 * derives from KicadFileError so callers can catch the whole family at once.
 */

import type { DocumentKind } from './fileTypes';

export interface SourcePosition {
  /** Character offset from the start of the input */
  offset: number;
  /** 1-based line */
  line: number;
  /** 1-based column */
  column: number;
}

export class KicadFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KicadFileError';
  }
}

/**
 * Thrown by the tokenizer and tree parser: bad quoting, unbalanced parentheses.
 */
export class SExprSyntaxError extends KicadFileError {
  constructor(
    message: string,
    public readonly position: SourcePosition,
    public readonly depth?: number,
  ) {
    super(`${message} (line ${position.line}, column ${position.column})`);
    this.name = 'SExprSyntaxError';
  }
}

/**
 * Thrown by the condition grammar. `offset` points into the condition string itself.
 */
export class ConditionSyntaxError extends SExprSyntaxError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly offset: number,
  ) {
    super(message, { offset, line: 1, column: offset + 1 });
    this.name = 'ConditionSyntaxError';
  }
}

export class EmptyDocumentError extends KicadFileError {
  constructor(public readonly path?: string) {
    super(path ? `Document is empty: ${path}` : 'Document is empty');
    this.name = 'EmptyDocumentError';
  }
}

/**
 * Thrown when a tree does not match the construct it is decoded as:
 * wrong or missing keyword, wrong arity, wrong atom type.
 */
export class SchemaError extends KicadFileError {
  constructor(
    public readonly construct: string,
    public readonly field: string,
    public readonly expected: string,
    public readonly found: string,
  ) {
    super(`Invalid '${construct}': field '${field}' expected ${expected}, found ${found}`);
    this.name = 'SchemaError';
  }
}

export class UnsupportedVersionError extends KicadFileError {
  constructor(
    public readonly kind: DocumentKind,
    public readonly version: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot decode ${kind} file with version ${version}${detail}`, { cause });
    this.name = 'UnsupportedVersionError';
  }
}

export class FileIOError extends KicadFileError {
  constructor(
    public readonly path: string,
    public readonly operation: 'read' | 'write',
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to ${operation} '${path}'${detail}`, { cause });
    this.name = 'FileIOError';
  }
}

/** Thrown when a value cannot be written as an S-expression atom */
export class FormatError extends KicadFileError {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

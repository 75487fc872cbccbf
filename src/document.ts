/**
 * Parsed Document
 * Core entry point: full text in, immutable parse result out.
 */

import type { Program } from './ast-nodes.js';
import { ParseError } from './error-classes.js';
import { parse } from './parser/index.js';
import { SymbolTable } from './symbols/index.js';

/** A syntax error reported against a document (1-based position) */
export interface DocumentError {
  readonly message: string;
  readonly line: number;
  readonly column: number;
}

/**
 * Result of parsing one version of a document.
 *
 * Either `ast` is complete and `errors` is empty, or `errors` holds the
 * single first error and `ast` and `symbols` are empty.
 */
export interface ParsedDocument {
  readonly text: string;
  readonly ast: Readonly<Program>;
  readonly symbols: SymbolTable;
  readonly errors: readonly DocumentError[];
}

/**
 * Parse full document text.
 * Syntax errors are captured in `errors`; any other exception propagates.
 */
export function parseDocument(text: string): ParsedDocument {
  let ast: Program;
  try {
    ast = parse(text);
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    return Object.freeze({
      text,
      ast: Object.freeze([]),
      symbols: new SymbolTable(),
      errors: Object.freeze([
        {
          message: err.toData().message,
          line: err.location.line,
          column: err.location.column,
        },
      ]),
    });
  }

  return Object.freeze({
    text,
    ast: Object.freeze(ast),
    symbols: SymbolTable.fromProgram(ast, text),
    errors: Object.freeze([]),
  });
}

/** Document with no content, used before a document has been opened */
export function emptyDocument(): ParsedDocument {
  return parseDocument('');
}

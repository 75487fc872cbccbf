/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { isIdentifierChar, isNumeric, makeToken } from './helpers.js';
import { lookupKeyword } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Integer literals with more digits than this are kept as digit strings */
export const MAX_EXACT_DIGITS = 15;

const DECIMAL_LITERAL = /^[0-9]+(\.[0-9]+)?$/;

/**
 * Decode escape sequences in a raw string body.
 * Recognized: \n \t \r \\ \". Any other escape keeps its backslash.
 */
export function processEscapes(raw: string): string {
  let value = '';
  let i = 0;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch !== '\\' || i + 1 >= raw.length) {
      value += ch;
      i++;
      continue;
    }
    const escaped = raw[i + 1];
    switch (escaped) {
      case 'n':
        value += '\n';
        break;
      case 't':
        value += '\t';
        break;
      case 'r':
        value += '\r';
        break;
      case '\\':
        value += '\\';
        break;
      case '"':
        value += '"';
        break;
      default:
        value += '\\' + escaped;
    }
    i += 2;
  }
  return value;
}

export function readString(state: LexerState, spaceBefore: boolean): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let raw = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\' && peek(state, 1) !== '') {
      raw += advance(state); // keep backslash for processEscapes
    }
    raw += advance(state);
  }

  if (isAtEnd(state)) {
    return makeToken(
      TOKEN_TYPES.ILLEGAL,
      '"',
      start,
      currentLocation(state),
      spaceBefore
    );
  }

  advance(state); // consume closing "
  return makeToken(
    TOKEN_TYPES.STRING,
    processEscapes(raw),
    start,
    currentLocation(state),
    spaceBefore
  );
}

export function readTripleQuoteString(
  state: LexerState,
  spaceBefore: boolean
): Token {
  const start = currentLocation(state);
  advance(state); // consume first "
  advance(state); // consume second "
  advance(state); // consume third "

  let raw = '';
  while (!isAtEnd(state)) {
    if (
      peek(state) === '"' &&
      peek(state, 1) === '"' &&
      peek(state, 2) === '"'
    ) {
      advance(state);
      advance(state);
      advance(state);
      return makeToken(
        TOKEN_TYPES.STRING,
        processEscapes(raw),
        start,
        currentLocation(state),
        spaceBefore
      );
    }
    raw += advance(state);
  }

  // EOF before closing """
  return makeToken(
    TOKEN_TYPES.ILLEGAL,
    '"',
    start,
    currentLocation(state),
    spaceBefore
  );
}

/**
 * Read a numeric literal: a run of digits with at most one decimal point,
 * the point only taken when a digit follows it.
 */
export function readNumber(state: LexerState, spaceBefore: boolean): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isNumeric(peek(state))) {
    value += advance(state);
  }

  let hasDot = false;
  if (peek(state) === '.' && isNumeric(peek(state, 1))) {
    hasDot = true;
    value += advance(state); // consume .
    while (!isAtEnd(state) && isNumeric(peek(state))) {
      value += advance(state);
    }
  }

  const end = currentLocation(state);

  // Non-ASCII numerals scan as part of the run but are not valid literals
  if (!DECIMAL_LITERAL.test(value)) {
    return makeToken(
      TOKEN_TYPES.ILLEGAL,
      Array.from(value)[0] ?? '',
      start,
      end,
      spaceBefore
    );
  }

  if (!hasDot && value.length > MAX_EXACT_DIGITS) {
    return makeToken(TOKEN_TYPES.BIG_INTEGER, value, start, end, spaceBefore);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, end, spaceBefore);
}

export function readIdentifier(state: LexerState, spaceBefore: boolean): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = lookupKeyword(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state), spaceBefore);
}

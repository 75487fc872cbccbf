/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const ALPHABETIC = /^\p{Alphabetic}$/u;
const NUMERIC = /^\p{N}$/u;

/** Any Unicode numeric scalar (decimal digits, letter-like numerals, ...) */
export function isNumeric(ch: string): boolean {
  return NUMERIC.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return ch === '_' || ALPHABETIC.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isNumeric(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation,
  spaceBefore: boolean
): Token {
  return { type, value, span: { start, end }, spaceBefore };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string,
  start: SourceLocation,
  spaceBefore: boolean
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, currentLocation(state), spaceBefore);
}

/**
 * Parser State
 * Two-token lookahead over a lazily scanned token stream
 */

import { ParseError } from '../error-classes.js';
import {
  createLexerState,
  type LexerState,
  nextToken,
} from '../lexer/index.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { describeToken, describeTokenType } from './helpers.js';

export interface ParserState {
  readonly lexer: LexerState;
  /** Token under the cursor */
  current: Token;
  /** One token of lookahead; carries its own spaceBefore flag */
  next: Token;
  /** Last consumed token, for span ends */
  previous: Token | null;
  /** Open expressions and blocks */
  depth: number;
}

/** Deepest expression or block nesting the parser accepts */
export const MAX_NESTING_DEPTH = 256;

export function createParserState(source: string): ParserState {
  const lexer = createLexerState(source);
  const current = nextToken(lexer);
  const next = nextToken(lexer);
  return { lexer, current, next, previous: null, depth: 0 };
}

// ============================================================
// TOKEN ACCESS
// ============================================================

export function current(state: ParserState): Token {
  return state.current;
}

export function peek(state: ParserState): Token {
  return state.next;
}

export function isAtEnd(state: ParserState): boolean {
  return state.current.type === TOKEN_TYPES.EOF;
}

export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(state.current.type);
}

/** Consume the current token and return it */
export function advance(state: ParserState): Token {
  const consumed = state.current;
  state.previous = consumed;
  state.current = state.next;
  state.next = nextToken(state.lexer);
  return consumed;
}

/**
 * Consume a token of the given type or fail.
 * At end of input the failure is an unexpected-eof error with a hint
 * naming the delimiter left open.
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string = describeTokenType(type)
): Token {
  if (state.current.type === type) {
    return advance(state);
  }
  if (isAtEnd(state)) {
    throw ParseError.unexpectedEof(
      expected,
      state.current.span.start,
      generateHint(type)
    );
  }
  throw ParseError.unexpectedToken(
    expected,
    describeToken(state.current),
    state.current.span.start
  );
}

export function skipNewlines(state: ParserState): void {
  while (state.current.type === TOKEN_TYPES.NEWLINE) {
    advance(state);
  }
}

/**
 * Run `parse` one nesting level deeper.
 * @throws {ParseError} invalid-expression past MAX_NESTING_DEPTH
 */
export function nested<T>(state: ParserState, parse: () => T): T {
  if (state.depth >= MAX_NESTING_DEPTH) {
    throw ParseError.invalidExpression(
      `nesting deeper than ${MAX_NESTING_DEPTH} levels`,
      state.current.span.start
    );
  }
  state.depth++;
  try {
    return parse();
  } finally {
    state.depth--;
  }
}

/** Consume one optional newline or semicolon after a simple statement */
export function consumeTerminator(state: ParserState): void {
  if (check(state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)) {
    advance(state);
  }
}

// ============================================================
// SPANS
// ============================================================

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the last consumed token */
export function spanFrom(
  state: ParserState,
  start: SourceLocation
): SourceSpan {
  return makeSpan(start, state.previous?.span.end ?? start);
}

// ============================================================
// MESSAGES
// ============================================================

const CLOSERS: Partial<Record<TokenType, string>> = {
  [TOKEN_TYPES.RPAREN]: '(',
  [TOKEN_TYPES.RBRACKET]: '[',
  [TOKEN_TYPES.RBRACE]: '{',
};

function generateHint(type: TokenType): string | undefined {
  const opener = CLOSERS[type];
  return opener ? `Check for an unclosed '${opener}'` : undefined;
}

/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advanceAndMakeToken,
  isIdentifierStart,
  isNumeric,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  readIdentifier,
  readNumber,
  readString,
  readTripleQuoteString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip spaces, tabs and carriage returns; report whether any were skipped */
function skipWhitespace(state: LexerState): boolean {
  let skipped = false;
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
    skipped = true;
  }
  return skipped;
}

/**
 * Skip one comment at the current position.
 * Returns false when no comment starts here.
 */
function skipComment(state: LexerState): boolean {
  const opener = peekString(state, 2);

  if (opener === '//') {
    while (!isAtEnd(state) && peek(state) !== '\n') {
      advance(state);
    }
    return true;
  }

  if (opener === '/*') {
    advance(state);
    advance(state);
    while (!isAtEnd(state) && peekString(state, 2) !== '*/') {
      advance(state);
    }
    if (!isAtEnd(state)) {
      advance(state);
      advance(state);
    }
    return true;
  }

  return false;
}

export function nextToken(state: LexerState): Token {
  // Only whitespace directly before the token counts; a comment resets it
  let spaceBefore = skipWhitespace(state);
  while (skipComment(state)) {
    spaceBefore = skipWhitespace(state);
  }

  const start = currentLocation(state);

  if (isAtEnd(state)) {
    return makeToken(TOKEN_TYPES.EOF, '', start, start, spaceBefore);
  }

  const ch = peek(state);

  // Newline
  if (ch === '\n') {
    return advanceAndMakeToken(
      state,
      1,
      TOKEN_TYPES.NEWLINE,
      '\n',
      start,
      spaceBefore
    );
  }

  // String
  if (ch === '"') {
    if (peekString(state, 3) === '"""') {
      return readTripleQuoteString(state, spaceBefore);
    }
    return readString(state, spaceBefore);
  }

  // Number (positive only - unary minus handled by parser)
  if (isNumeric(ch)) {
    return readNumber(state, spaceBefore);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state, spaceBefore);
  }

  // Two-character operators (lookup table)
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(
      state,
      2,
      twoCharType,
      twoChar,
      start,
      spaceBefore
    );
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(
      state,
      1,
      singleCharType,
      ch,
      start,
      spaceBefore
    );
  }

  // Lone `&`, `|` and anything unscannable
  return advanceAndMakeToken(
    state,
    1,
    TOKEN_TYPES.ILLEGAL,
    ch,
    start,
    spaceBefore
  );
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}

/**
 * Lazy token sequence. Each iteration rescans from the start and ends
 * after yielding EOF.
 */
export function scanTokens(source: string): Iterable<Token> {
  return {
    *[Symbol.iterator](): Generator<Token, void, undefined> {
      const state = createLexerState(source);
      let token: Token;
      do {
        token = nextToken(state);
        yield token;
      } while (token.type !== TOKEN_TYPES.EOF);
    },
  };
}

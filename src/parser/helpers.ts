/**
 * Parser Helpers
 * Precedence table, identifier rules and message formatting
 * @internal This module contains internal parser utilities
 */

import type { BinaryOp } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import {
  KEYWORDS,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from '../lexer/operators.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

// ============================================================
// PRECEDENCE
// ============================================================

/** Binding power, lowest to highest */
export const PRECEDENCE = {
  LOWEST: 0,
  OR: 1,
  AND: 2,
  EQUALS: 3,
  COMPARISON: 4,
  SUM: 5,
  PRODUCT: 6,
  PREFIX: 7,
  CALL: 8,
  INDEX: 9,
} as const;

export type Precedence = (typeof PRECEDENCE)[keyof typeof PRECEDENCE];

const TOKEN_PRECEDENCE: Partial<Record<TokenType, Precedence>> = {
  [TOKEN_TYPES.OR]: PRECEDENCE.OR,
  [TOKEN_TYPES.AND]: PRECEDENCE.AND,
  [TOKEN_TYPES.EQ]: PRECEDENCE.EQUALS,
  [TOKEN_TYPES.NE]: PRECEDENCE.EQUALS,
  [TOKEN_TYPES.LT]: PRECEDENCE.COMPARISON,
  [TOKEN_TYPES.LE]: PRECEDENCE.COMPARISON,
  [TOKEN_TYPES.GT]: PRECEDENCE.COMPARISON,
  [TOKEN_TYPES.GE]: PRECEDENCE.COMPARISON,
  [TOKEN_TYPES.PLUS]: PRECEDENCE.SUM,
  [TOKEN_TYPES.MINUS]: PRECEDENCE.SUM,
  [TOKEN_TYPES.STAR]: PRECEDENCE.PRODUCT,
  [TOKEN_TYPES.SLASH]: PRECEDENCE.PRODUCT,
  [TOKEN_TYPES.PERCENT]: PRECEDENCE.PRODUCT,
  [TOKEN_TYPES.LPAREN]: PRECEDENCE.CALL,
  [TOKEN_TYPES.LBRACKET]: PRECEDENCE.INDEX,
};

export function tokenPrecedence(type: TokenType): Precedence {
  return TOKEN_PRECEDENCE[type] ?? PRECEDENCE.LOWEST;
}

/** Binary operator for an infix token */
export const BINARY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.AND]: '&&',
  [TOKEN_TYPES.OR]: '||',
};

/** Tokens that end an expression regardless of precedence */
const EXPRESSION_BOUNDARIES: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.NEWLINE,
  TOKEN_TYPES.SEMICOLON,
  TOKEN_TYPES.EOF,
  TOKEN_TYPES.RPAREN,
  TOKEN_TYPES.RBRACKET,
  TOKEN_TYPES.RBRACE,
  TOKEN_TYPES.COMMA,
  TOKEN_TYPES.COLON,
]);

export function isExpressionBoundary(type: TokenType): boolean {
  return EXPRESSION_BOUNDARIES.has(type);
}

// ============================================================
// IDENTIFIER RULES
// ============================================================

const STARTS_WITH_DIGIT = /^\p{N}/u;
const UPPER_SNAKE = /^[\p{Lu}\p{N}_]+$/u;
const BINDER = /^[\p{Alphabetic}\p{N}_]+$/u;

export const IDENTIFIER_REASONS = {
  DIGIT_START: 'identifiers cannot start with a digit',
  BINDER:
    'parameter names may only contain letters, digits and underscores',
  DECLARATION:
    'variable and function names must use UPPER_SNAKE_CASE (e.g. MY_VAR, CALCULATE_SUM)',
} as const;

/** Declaration names: uppercase letters, digits and `_`, no leading digit */
export function isDeclarationName(name: string): boolean {
  return !STARTS_WITH_DIGIT.test(name) && UPPER_SNAKE.test(name);
}

/** Parameter and lambda binder names: any-case letters, digits and `_` */
export function isBinderName(name: string): boolean {
  return !STARTS_WITH_DIGIT.test(name) && BINDER.test(name);
}

/**
 * Validate the name introduced by Set, Func, Generator or Lazy.
 * @throws {ParseError} invalid-identifier at the name token
 */
export function validateDeclarationName(token: Token): void {
  validateName(token, isDeclarationName, IDENTIFIER_REASONS.DECLARATION);
}

/**
 * Validate a parameter or lambda binder name.
 * @throws {ParseError} invalid-identifier at the name token
 */
export function validateBinderName(token: Token): void {
  validateName(token, isBinderName, IDENTIFIER_REASONS.BINDER);
}

function validateName(
  token: Token,
  accepts: (name: string) => boolean,
  reason: string
): void {
  const name = token.value;
  if (STARTS_WITH_DIGIT.test(name)) {
    throw ParseError.invalidIdentifier(
      name,
      IDENTIFIER_REASONS.DIGIT_START,
      token.span.start
    );
  }
  if (!accepts(name)) {
    throw ParseError.invalidIdentifier(name, reason, token.span.start);
  }
}

// ============================================================
// MESSAGES
// ============================================================

const TOKEN_TEXT: Partial<Record<TokenType, string>> = {};
for (const table of [KEYWORDS, TWO_CHAR_OPERATORS, SINGLE_CHAR_OPERATORS]) {
  for (const [text, type] of Object.entries(table)) {
    TOKEN_TEXT[type] = text;
  }
}

const CATEGORY_NAMES: Partial<Record<TokenType, string>> = {
  [TOKEN_TYPES.IDENTIFIER]: 'identifier',
  [TOKEN_TYPES.STRING]: 'string',
  [TOKEN_TYPES.NUMBER]: 'number',
  [TOKEN_TYPES.BIG_INTEGER]: 'number',
  [TOKEN_TYPES.NEWLINE]: 'newline',
  [TOKEN_TYPES.EOF]: 'end of input',
  [TOKEN_TYPES.ILLEGAL]: 'illegal character',
};

/** Description of a token type for "Expected X" messages */
export function describeTokenType(type: TokenType): string {
  const text = TOKEN_TEXT[type];
  if (text !== undefined) return `'${text}'`;
  return CATEGORY_NAMES[type] ?? type;
}

/** Description of a concrete token for "found Y" messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      return `identifier '${token.value}'`;
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.BIG_INTEGER:
      return `number ${token.value}`;
    case TOKEN_TYPES.STRING:
      return `string ${JSON.stringify(token.value)}`;
    case TOKEN_TYPES.ILLEGAL:
      return `illegal character '${token.value}'`;
    default:
      return describeTokenType(token.type);
  }
}

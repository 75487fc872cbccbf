import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Keywords
  SET: 'SET',
  FUNC: 'FUNC',
  RETURN: 'RETURN',
  IF: 'IF',
  ELIF: 'ELIF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  FOR: 'FOR',
  IN: 'IN',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',
  GENERATOR: 'GENERATOR',
  YIELD: 'YIELD',
  LAZY: 'LAZY',
  FORCE: 'FORCE',
  SWITCH: 'SWITCH',
  CASE: 'CASE',
  DEFAULT: 'DEFAULT',
  IMPORT: 'IMPORT',
  EXPORT: 'EXPORT',
  FROM: 'FROM',
  AS: 'AS',
  LAMBDA: 'LAMBDA',
  THROW: 'THROW',
  TRY: 'TRY',
  CATCH: 'CATCH',

  // Literals
  NUMBER: 'NUMBER',
  BIG_INTEGER: 'BIG_INTEGER', // integer literal longer than 15 digits
  STRING: 'STRING',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NULL: 'NULL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %

  // Assignment
  ASSIGN: 'ASSIGN', // =

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  GT: 'GT', // >
  GE: 'GE', // >=
  LT: 'LT', // <
  LE: 'LE', // <=

  // Boolean operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  BANG: 'BANG', // !

  ARROW: 'ARROW', // ->

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;

  // Special
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
  ILLEGAL: 'ILLEGAL', // unscannable input; value holds the offending character
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/**
 * A scanned token.
 *
 * `value` is the payload: the decoded text for STRING, the lexeme for
 * NUMBER, BIG_INTEGER and IDENTIFIER, the character for ILLEGAL, and the
 * source text for everything else.
 */
export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
  /** Whether spaces, tabs or carriage returns directly preceded the token */
  readonly spaceBefore: boolean;
}

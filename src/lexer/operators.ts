/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '->': TOKEN_TYPES.ARROW,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
};

/** Single-character operator lookup table (no bitwise `&` or `|`) */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '=': TOKEN_TYPES.ASSIGN,
  '!': TOKEN_TYPES.BANG,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Keyword lookup table. Case-sensitive: `set` is an identifier. */
export const KEYWORDS: Record<string, TokenType> = {
  Set: TOKEN_TYPES.SET,
  Func: TOKEN_TYPES.FUNC,
  Return: TOKEN_TYPES.RETURN,
  If: TOKEN_TYPES.IF,
  Elif: TOKEN_TYPES.ELIF,
  Else: TOKEN_TYPES.ELSE,
  While: TOKEN_TYPES.WHILE,
  For: TOKEN_TYPES.FOR,
  In: TOKEN_TYPES.IN,
  Break: TOKEN_TYPES.BREAK,
  Continue: TOKEN_TYPES.CONTINUE,
  Generator: TOKEN_TYPES.GENERATOR,
  Yield: TOKEN_TYPES.YIELD,
  Lazy: TOKEN_TYPES.LAZY,
  Force: TOKEN_TYPES.FORCE,
  Switch: TOKEN_TYPES.SWITCH,
  Case: TOKEN_TYPES.CASE,
  Default: TOKEN_TYPES.DEFAULT,
  Import: TOKEN_TYPES.IMPORT,
  Export: TOKEN_TYPES.EXPORT,
  From: TOKEN_TYPES.FROM,
  As: TOKEN_TYPES.AS,
  Lambda: TOKEN_TYPES.LAMBDA,
  Throw: TOKEN_TYPES.THROW,
  Try: TOKEN_TYPES.TRY,
  Catch: TOKEN_TYPES.CATCH,
  True: TOKEN_TYPES.TRUE,
  False: TOKEN_TYPES.FALSE,
  Null: TOKEN_TYPES.NULL,
};

/** Look up a keyword without tripping over Object.prototype members */
export function lookupKeyword(text: string): TokenType | undefined {
  return Object.hasOwn(KEYWORDS, text) ? KEYWORDS[text] : undefined;
}

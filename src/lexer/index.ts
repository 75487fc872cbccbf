/**
 * Lexer
 * Converts source text into tokens
 */

export { createLexerState, type LexerState } from './state.js';
export { nextToken, scanTokens, tokenize } from './tokenizer.js';
export { KEYWORDS, lookupKeyword } from './operators.js';
export { MAX_EXACT_DIGITS, processEscapes } from './readers.js';

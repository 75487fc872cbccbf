/**
 * Aether Analyzer
 * Exports lexer, parser, AST types, symbols, lint and editor collaborators
 */

export {
  createLexerState,
  KEYWORDS,
  lookupKeyword,
  MAX_EXACT_DIGITS,
  nextToken,
  processEscapes,
  scanTokens,
  tokenize,
  type LexerState,
} from './lexer/index.js';
export {
  IDENTIFIER_REASONS,
  isBinderName,
  isDeclarationName,
  parse,
  Parser,
  PRECEDENCE,
  type Precedence,
} from './parser/index.js';
export {
  emptyDocument,
  parseDocument,
  type DocumentError,
  type ParsedDocument,
} from './document.js';

// ============================================================
// TOKENS, LOCATIONS AND AST
// ============================================================
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type { SourceLocation, SourceSpan } from './source-location.js';
export type * from './ast-nodes.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type ErrorSeverity,
} from './error-registry.js';
export {
  AetherError,
  CheckConfigError,
  ParseError,
  type AetherErrorData,
  type ParseErrorKind,
} from './error-classes.js';

// ============================================================
// SYMBOLS, LINT AND EDITOR SUPPORT
// ============================================================
export {
  collectLeadingComment,
  spanToRange,
  SymbolTable,
  type SymbolInfo,
} from './symbols/index.js';
export * from './check/index.js';
export * from './builtins/index.js';
export * from './lsp/index.js';

/**
 * Parser Extension: Declarations
 * Set, Func, Generator, Lazy, Import and Export
 */

import { Parser } from './parser.js';
import type {
  ExportNode,
  FuncDefNode,
  GeneratorDefNode,
  ImportNode,
  LazyDefNode,
  SetIndexNode,
  SetNode,
} from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { validateDeclarationName } from './helpers.js';
import {
  advance,
  check,
  consumeTerminator,
  current,
  expect,
  skipNewlines,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseSet(): SetNode | SetIndexNode;
    parseFuncDef(): FuncDefNode;
    parseGeneratorDef(): GeneratorDefNode;
    parseLazyDef(): LazyDefNode;
    parseImport(): ImportNode;
    parseImportEntry(): { name: string; alias: string | null };
    parseExport(): ExportNode;
    parseDeclarationName(): Token;
  }
}

/** Name after Set/Func/Generator/Lazy, held to UPPER_SNAKE_CASE */
Parser.prototype.parseDeclarationName = function (this: Parser): Token {
  const token = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier');
  validateDeclarationName(token);
  return token;
};

// ============================================================
// SET
// ============================================================

/**
 * Set NAME value
 * Set NAME [array]       (space before `[`: the bracket starts the value)
 * Set NAME[index] value  (no space: index assignment)
 */
Parser.prototype.parseSet = function (this: Parser): SetNode | SetIndexNode {
  const start = advance(this.state).span.start; // Set
  const nameToken = this.parseDeclarationName();

  if (
    check(this.state, TOKEN_TYPES.LBRACKET) &&
    !current(this.state).spaceBefore
  ) {
    advance(this.state); // [
    const index = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RBRACKET, "']' for index access");
    const value = this.parseExpression();
    const span = spanFrom(this.state, start);
    consumeTerminator(this.state);

    return {
      type: 'SetIndex',
      object: {
        type: 'Identifier',
        name: nameToken.value,
        span: nameToken.span,
      },
      index,
      value,
      span,
    };
  }

  const value = this.parseExpression();
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);

  return {
    type: 'Set',
    name: nameToken.value,
    nameSpan: nameToken.span,
    value,
    span,
  };
};

// ============================================================
// FUNCTIONS
// ============================================================

Parser.prototype.parseFuncDef = function (this: Parser): FuncDefNode {
  const start = advance(this.state).span.start; // Func
  const nameToken = this.parseDeclarationName();
  const params = this.parseParameters();
  skipNewlines(this.state);
  const body = this.parseBlock();

  return {
    type: 'FuncDef',
    name: nameToken.value,
    nameSpan: nameToken.span,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseGeneratorDef = function (
  this: Parser
): GeneratorDefNode {
  const start = advance(this.state).span.start; // Generator
  const nameToken = this.parseDeclarationName();
  const params = this.parseParameters();
  skipNewlines(this.state);
  const body = this.parseBlock();

  return {
    type: 'GeneratorDef',
    name: nameToken.value,
    nameSpan: nameToken.span,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

/** Lazy NAME(expr) */
Parser.prototype.parseLazyDef = function (this: Parser): LazyDefNode {
  const start = advance(this.state).span.start; // Lazy
  const nameToken = this.parseDeclarationName();
  expect(this.state, TOKEN_TYPES.LPAREN);
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN);
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);

  return {
    type: 'LazyDef',
    name: nameToken.value,
    nameSpan: nameToken.span,
    expression,
    span,
  };
};

// ============================================================
// MODULES
// ============================================================

Parser.prototype.parseImportEntry = function (this: Parser): {
  name: string;
  alias: string | null;
} {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier').value;
  let alias: string | null = null;
  if (check(this.state, TOKEN_TYPES.AS)) {
    advance(this.state);
    alias = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier').value;
  }
  return { name, alias };
};

/**
 * Import NAME [As ALIAS] From "path"
 * Import { NAME [As ALIAS], ... } From "path"
 */
Parser.prototype.parseImport = function (this: Parser): ImportNode {
  const start = advance(this.state).span.start; // Import
  const names: string[] = [];
  const aliases: (string | null)[] = [];

  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    advance(this.state);
    skipNewlines(this.state);
    while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
      const entry = this.parseImportEntry();
      names.push(entry.name);
      aliases.push(entry.alias);
      skipNewlines(this.state);
      if (!check(this.state, TOKEN_TYPES.COMMA)) break;
      advance(this.state);
      skipNewlines(this.state);
    }
    expect(this.state, TOKEN_TYPES.RBRACE);
  } else {
    const entry = this.parseImportEntry();
    names.push(entry.name);
    aliases.push(entry.alias);
  }

  expect(this.state, TOKEN_TYPES.FROM);
  const path = expect(this.state, TOKEN_TYPES.STRING, 'string').value;
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);

  return { type: 'Import', names, aliases, path, span };
};

Parser.prototype.parseExport = function (this: Parser): ExportNode {
  const start = advance(this.state).span.start; // Export
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier').value;
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);

  return { type: 'Export', name, span };
};

/**
 * Parser Extension: Literal Parsing
 * Arrays, dicts, lambdas and parameter lists
 */

import { Parser } from './parser.js';
import type {
  ArrayLiteralNode,
  DictEntry,
  DictLiteralNode,
  ExpressionNode,
  LambdaNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { describeToken, validateBinderName } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  skipNewlines,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseArrayLiteral(): ArrayLiteralNode;
    parseDictLiteral(): DictLiteralNode;
    parseFuncLambda(): LambdaNode;
    parseArrowLambda(): LambdaNode;
    parseParameters(): string[];
  }
}

// ============================================================
// COLLECTIONS
// ============================================================

/** [a, b, ...]; newlines allowed between elements */
Parser.prototype.parseArrayLiteral = function (
  this: Parser
): ArrayLiteralNode {
  const start = advance(this.state).span.start; // [
  const elements: ExpressionNode[] = [];

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RBRACKET, TOKEN_TYPES.EOF)) {
    elements.push(this.parseExpression());
    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
    skipNewlines(this.state);
  }
  expect(this.state, TOKEN_TYPES.RBRACKET);

  return { type: 'ArrayLiteral', elements, span: spanFrom(this.state, start) };
};

/** {key: value, "key": value, ...}; keys are identifiers or strings */
Parser.prototype.parseDictLiteral = function (this: Parser): DictLiteralNode {
  const start = advance(this.state).span.start; // {
  const entries: DictEntry[] = [];

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
    const keyToken = current(this.state);
    if (!check(this.state, TOKEN_TYPES.IDENTIFIER, TOKEN_TYPES.STRING)) {
      throw ParseError.unexpectedToken(
        'identifier or string',
        describeToken(keyToken),
        keyToken.span.start
      );
    }
    advance(this.state);
    expect(this.state, TOKEN_TYPES.COLON);
    entries.push({ key: keyToken.value, value: this.parseExpression() });

    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
    skipNewlines(this.state);
  }
  expect(this.state, TOKEN_TYPES.RBRACE);

  return { type: 'DictLiteral', entries, span: spanFrom(this.state, start) };
};

// ============================================================
// LAMBDAS
// ============================================================

/** Func(params) { body } */
Parser.prototype.parseFuncLambda = function (this: Parser): LambdaNode {
  const start = advance(this.state).span.start; // Func
  const params = this.parseParameters();
  skipNewlines(this.state);
  const body = this.parseBlock();

  return { type: 'Lambda', params, body, span: spanFrom(this.state, start) };
};

/**
 * Lambda X -> expr
 * Lambda (X, Y) -> expr
 *
 * The body becomes a single Return of the expression.
 */
Parser.prototype.parseArrowLambda = function (this: Parser): LambdaNode {
  const start = advance(this.state).span.start; // Lambda

  let params: string[];
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    params = this.parseParameters();
  } else if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    const binder = advance(this.state);
    validateBinderName(binder);
    params = [binder.value];
  } else {
    const token = current(this.state);
    throw ParseError.unexpectedToken(
      "identifier or '('",
      describeToken(token),
      token.span.start
    );
  }

  expect(this.state, TOKEN_TYPES.ARROW);
  const value = this.parseExpression();

  return {
    type: 'Lambda',
    params,
    body: [{ type: 'Return', value, span: value.span }],
    span: spanFrom(this.state, start),
  };
};

/** (A, b, c_1); a trailing comma is accepted */
Parser.prototype.parseParameters = function (this: Parser): string[] {
  expect(this.state, TOKEN_TYPES.LPAREN);
  const params: string[] = [];

  while (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    const token = advance(this.state);
    validateBinderName(token);
    params.push(token.value);
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  expect(this.state, TOKEN_TYPES.RPAREN);
  return params;
};

/**
 * Parser Extension: Expression Parsing
 * Precedence climbing over prefix and infix forms
 */

import { Parser } from './parser.js';
import type {
  BinaryExprNode,
  CallNode,
  ExpressionNode,
  IndexNode,
  UnaryExprNode,
  UnaryOp,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  BINARY_OPS,
  describeToken,
  isExpressionBoundary,
  PRECEDENCE,
  type Precedence,
  tokenPrecedence,
} from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  nested,
  skipNewlines,
  spanFrom,
} from './state.js';

const NUMERIC_START = /^\p{N}$/u;

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(minPrecedence?: Precedence): ExpressionNode;
    parsePrefix(): ExpressionNode;
    parseInfix(left: ExpressionNode): ExpressionNode;
    parseGrouped(): ExpressionNode;
    parseUnary(op: UnaryOp): UnaryExprNode;
    parseBinary(left: ExpressionNode): BinaryExprNode;
    parseCall(callee: ExpressionNode): CallNode;
    parseIndex(object: ExpressionNode): IndexNode;
  }
}

// ============================================================
// PRECEDENCE CLIMBING
// ============================================================

/**
 * Parse an expression whose infix operators all bind tighter than
 * `minPrecedence`. Stops at newline, `;`, `)`, `]`, `}`, `,`, `:` and EOF.
 */
Parser.prototype.parseExpression = function (
  this: Parser,
  minPrecedence: Precedence = PRECEDENCE.LOWEST
): ExpressionNode {
  return nested(this.state, () => {
    let left = this.parsePrefix();

    for (;;) {
      const type = current(this.state).type;
      if (
        isExpressionBoundary(type) ||
        minPrecedence >= tokenPrecedence(type)
      ) {
        break;
      }
      left = this.parseInfix(left);
    }

    return left;
  });
};

// ============================================================
// PREFIX FORMS
// ============================================================

Parser.prototype.parsePrefix = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER: {
      advance(this.state);
      const value = Number(token.value);
      if (!Number.isFinite(value)) {
        throw ParseError.invalidNumber(token.value, token.span.start);
      }
      return { type: 'NumberLiteral', value, span: token.span };
    }
    case TOKEN_TYPES.BIG_INTEGER:
      advance(this.state);
      return {
        type: 'BigIntegerLiteral',
        digits: token.value,
        span: token.span,
      };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };
    case TOKEN_TYPES.NULL:
      advance(this.state);
      return { type: 'NullLiteral', span: token.span };
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.FORCE:
      // Force(expr) is an ordinary call on the identifier `Force`
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };
    case TOKEN_TYPES.LPAREN:
      return this.parseGrouped();
    case TOKEN_TYPES.LBRACKET:
      return this.parseArrayLiteral();
    case TOKEN_TYPES.LBRACE:
      return this.parseDictLiteral();
    case TOKEN_TYPES.MINUS:
      return this.parseUnary('-');
    case TOKEN_TYPES.BANG:
      return this.parseUnary('!');
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.FUNC:
      return this.parseFuncLambda();
    case TOKEN_TYPES.LAMBDA:
      return this.parseArrowLambda();
    case TOKEN_TYPES.ILLEGAL:
      if (NUMERIC_START.test(token.value)) {
        throw ParseError.invalidNumber(token.value, token.span.start);
      }
      if (token.value === '"') {
        throw ParseError.invalidExpression(
          'unterminated string literal',
          token.span.start
        );
      }
      throw ParseError.invalidExpression(
        `unexpected character '${token.value}'`,
        token.span.start
      );
    default:
      throw ParseError.invalidExpression(
        `Unexpected token in expression: ${describeToken(token)}`,
        token.span.start
      );
  }
};

/** (expr); the parentheses leave no node behind */
Parser.prototype.parseGrouped = function (this: Parser): ExpressionNode {
  advance(this.state); // (
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN);
  return expression;
};

Parser.prototype.parseUnary = function (
  this: Parser,
  op: UnaryOp
): UnaryExprNode {
  const start = advance(this.state).span.start;
  const operand = this.parseExpression(PRECEDENCE.PREFIX);
  return { type: 'UnaryExpr', op, operand, span: spanFrom(this.state, start) };
};

// ============================================================
// INFIX FORMS
// ============================================================

Parser.prototype.parseInfix = function (
  this: Parser,
  left: ExpressionNode
): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseCall(left);
  }
  if (check(this.state, TOKEN_TYPES.LBRACKET)) {
    return this.parseIndex(left);
  }
  return this.parseBinary(left);
};

/**
 * left op right. The right operand binds at the operator's own level,
 * so operators of equal precedence associate to the left.
 */
Parser.prototype.parseBinary = function (
  this: Parser,
  left: ExpressionNode
): BinaryExprNode {
  const token = current(this.state);
  const op = BINARY_OPS[token.type];
  if (op === undefined) {
    throw ParseError.invalidExpression(
      'Invalid binary operator',
      token.span.start
    );
  }
  advance(this.state);
  const right = this.parseExpression(tokenPrecedence(token.type));

  return {
    type: 'BinaryExpr',
    op,
    left,
    right,
    span: spanFrom(this.state, left.span.start),
  };
};

/** callee(arg, ...) */
Parser.prototype.parseCall = function (
  this: Parser,
  callee: ExpressionNode
): CallNode {
  advance(this.state); // (
  const args: ExpressionNode[] = [];

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RPAREN, TOKEN_TYPES.EOF)) {
    args.push(this.parseExpression());
    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
    skipNewlines(this.state);
  }
  expect(this.state, TOKEN_TYPES.RPAREN);

  return {
    type: 'Call',
    callee,
    args,
    span: spanFrom(this.state, callee.span.start),
  };
};

/** object[index] */
Parser.prototype.parseIndex = function (
  this: Parser,
  object: ExpressionNode
): IndexNode {
  advance(this.state); // [
  const index = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RBRACKET);

  return {
    type: 'Index',
    object,
    index,
    span: spanFrom(this.state, object.span.start),
  };
};

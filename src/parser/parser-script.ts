/**
 * Parser Extension: Program Parsing
 * Program, statement dispatch and single-keyword statements
 */

import { Parser } from './parser.js';
import type {
  BreakNode,
  ContinueNode,
  ExpressionNode,
  ExpressionStatementNode,
  Program,
  ReturnNode,
  StatementNode,
  ThrowNode,
  YieldNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import type { SourceSpan } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  consumeTerminator,
  current,
  isAtEnd,
  makeSpan,
  skipNewlines,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): Program;
    parseStatement(): StatementNode;
    parseReturn(): ReturnNode;
    parseYield(): YieldNode;
    parseBreak(): BreakNode;
    parseContinue(): ContinueNode;
    parseThrow(): ThrowNode;
    parseExpressionStatement(): ExpressionStatementNode;
    parseOptionalValue(): ExpressionNode;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): Program {
  const statements: StatementNode[] = [];

  skipNewlines(this.state);
  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());
    skipNewlines(this.state);
  }

  return statements;
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.SET:
      return this.parseSet();
    case TOKEN_TYPES.FUNC:
      // `Func(` at statement start is a lambda expression
      if (this.state.next.type === TOKEN_TYPES.LPAREN) {
        return this.parseExpressionStatement();
      }
      return this.parseFuncDef();
    case TOKEN_TYPES.GENERATOR:
      return this.parseGeneratorDef();
    case TOKEN_TYPES.LAZY:
      return this.parseLazyDef();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.YIELD:
      return this.parseYield();
    case TOKEN_TYPES.BREAK:
      return this.parseBreak();
    case TOKEN_TYPES.CONTINUE:
      return this.parseContinue();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.SWITCH:
      return this.parseSwitch();
    case TOKEN_TYPES.IMPORT:
      return this.parseImport();
    case TOKEN_TYPES.EXPORT:
      return this.parseExport();
    case TOKEN_TYPES.THROW:
      return this.parseThrow();
    case TOKEN_TYPES.TRY:
    case TOKEN_TYPES.CATCH:
      throw ParseError.invalidStatement(
        `'${token.value}' is reserved but not supported`,
        token.span.start
      );
    case TOKEN_TYPES.ELIF:
    case TOKEN_TYPES.ELSE:
      throw ParseError.invalidStatement(
        `'${token.value}' without a preceding If`,
        token.span.start
      );
    case TOKEN_TYPES.CASE:
    case TOKEN_TYPES.DEFAULT:
      throw ParseError.invalidStatement(
        `'${token.value}' outside of a Switch`,
        token.span.start
      );
    default:
      return this.parseExpressionStatement();
  }
};

// ============================================================
// SIMPLE STATEMENTS
// ============================================================

/**
 * Value after Return/Yield. Nothing before a newline, `;`, `}` or the
 * end of input means Null.
 */
Parser.prototype.parseOptionalValue = function (
  this: Parser
): ExpressionNode {
  if (
    check(
      this.state,
      TOKEN_TYPES.NEWLINE,
      TOKEN_TYPES.SEMICOLON,
      TOKEN_TYPES.RBRACE,
      TOKEN_TYPES.EOF
    )
  ) {
    const at = current(this.state).span.start;
    return { type: 'NullLiteral', span: makeSpan(at, at) };
  }
  return this.parseExpression();
};

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = advance(this.state).span.start;
  const value = this.parseOptionalValue();
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);
  return { type: 'Return', value, span };
};

Parser.prototype.parseYield = function (this: Parser): YieldNode {
  const start = advance(this.state).span.start;
  const value = this.parseOptionalValue();
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);
  return { type: 'Yield', value, span };
};

Parser.prototype.parseBreak = function (this: Parser): BreakNode {
  const span: SourceSpan = advance(this.state).span;
  consumeTerminator(this.state);
  return { type: 'Break', span };
};

Parser.prototype.parseContinue = function (this: Parser): ContinueNode {
  const span: SourceSpan = advance(this.state).span;
  consumeTerminator(this.state);
  return { type: 'Continue', span };
};

Parser.prototype.parseThrow = function (this: Parser): ThrowNode {
  const start = advance(this.state).span.start;
  const value = this.parseExpression();
  const span = spanFrom(this.state, start);
  consumeTerminator(this.state);
  return { type: 'Throw', value, span };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode {
  const expression = this.parseExpression();
  consumeTerminator(this.state);
  return { type: 'ExpressionStatement', expression, span: expression.span };
};

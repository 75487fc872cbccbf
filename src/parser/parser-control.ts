/**
 * Parser Extension: Control Flow Parsing
 * Blocks, loops, switch and conditional expressions
 */

import { Parser } from './parser.js';
import type {
  ElifBranch,
  ForIndexedNode,
  ForNode,
  IfExprNode,
  StatementNode,
  SwitchCase,
  SwitchNode,
  WhileNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { validateBinderName } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  nested,
  skipNewlines,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): StatementNode[];
    parseStatementsUntil(...terminators: TokenType[]): StatementNode[];
    parseWhile(): WhileNode;
    parseFor(): ForNode | ForIndexedNode;
    parseSwitch(): SwitchNode;
    parseIf(): IfExprNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** { statements } */
Parser.prototype.parseBlock = function (this: Parser): StatementNode[] {
  expect(this.state, TOKEN_TYPES.LBRACE);
  const body = this.parseStatementsUntil(TOKEN_TYPES.RBRACE);
  expect(this.state, TOKEN_TYPES.RBRACE);
  return body;
};

/**
 * Statements up to (not including) one of the terminators or EOF.
 * Each nested body counts one level toward MAX_NESTING_DEPTH.
 */
Parser.prototype.parseStatementsUntil = function (
  this: Parser,
  ...terminators: TokenType[]
): StatementNode[] {
  return nested(this.state, () => {
    const statements: StatementNode[] = [];
    skipNewlines(this.state);
    while (!check(this.state, ...terminators, TOKEN_TYPES.EOF)) {
      statements.push(this.parseStatement());
      skipNewlines(this.state);
    }
    return statements;
  });
};

// ============================================================
// LOOPS
// ============================================================

/** While (condition) { body } */
Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = advance(this.state).span.start; // While
  expect(this.state, TOKEN_TYPES.LPAREN);
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN);
  skipNewlines(this.state);
  const body = this.parseBlock();

  return { type: 'While', condition, body, span: spanFrom(this.state, start) };
};

/**
 * For VAR In iterable { body }
 * For INDEX, VALUE In iterable { body }
 */
Parser.prototype.parseFor = function (this: Parser): ForNode | ForIndexedNode {
  const start = advance(this.state).span.start; // For
  const first = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier');
  validateBinderName(first);

  let second: string | null = null;
  if (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    const token = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier');
    validateBinderName(token);
    second = token.value;
  }

  expect(this.state, TOKEN_TYPES.IN);
  const iterable = this.parseExpression();
  skipNewlines(this.state);
  const body = this.parseBlock();
  const span = spanFrom(this.state, start);

  if (second !== null) {
    return {
      type: 'ForIndexed',
      indexVar: first.value,
      valueVar: second,
      iterable,
      body,
      span,
    };
  }
  return { type: 'For', variable: first.value, iterable, body, span };
};

// ============================================================
// SWITCH
// ============================================================

/**
 * Switch (expr) { Case value: statements ... Default: statements }
 * Case bodies run until the next Case, Default or closing brace.
 */
Parser.prototype.parseSwitch = function (this: Parser): SwitchNode {
  const start = advance(this.state).span.start; // Switch
  expect(this.state, TOKEN_TYPES.LPAREN);
  const discriminant = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN);
  skipNewlines(this.state);
  expect(this.state, TOKEN_TYPES.LBRACE);
  skipNewlines(this.state);

  const cases: SwitchCase[] = [];
  let defaultBody: StatementNode[] | null = null;

  while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
    if (check(this.state, TOKEN_TYPES.CASE)) {
      advance(this.state);
      const test = this.parseExpression();
      expect(this.state, TOKEN_TYPES.COLON);
      const body = this.parseStatementsUntil(
        TOKEN_TYPES.CASE,
        TOKEN_TYPES.DEFAULT,
        TOKEN_TYPES.RBRACE
      );
      cases.push({ test, body });
    } else if (check(this.state, TOKEN_TYPES.DEFAULT)) {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.COLON);
      defaultBody = this.parseStatementsUntil(
        TOKEN_TYPES.CASE,
        TOKEN_TYPES.DEFAULT,
        TOKEN_TYPES.RBRACE
      );
      break;
    } else {
      throw ParseError.invalidStatement(
        "expected 'Case' or 'Default' in Switch body",
        current(this.state).span.start
      );
    }
  }

  expect(this.state, TOKEN_TYPES.RBRACE);

  return {
    type: 'Switch',
    discriminant,
    cases,
    defaultBody,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CONDITIONALS
// ============================================================

/** If (cond) { } Elif (cond) { } ... Else { } */
Parser.prototype.parseIf = function (this: Parser): IfExprNode {
  const start = advance(this.state).span.start; // If
  expect(this.state, TOKEN_TYPES.LPAREN);
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN);
  skipNewlines(this.state);
  const thenBranch = this.parseBlock();
  let end = spanFrom(this.state, start);
  skipNewlines(this.state);

  const elifBranches: ElifBranch[] = [];
  while (check(this.state, TOKEN_TYPES.ELIF)) {
    advance(this.state);
    expect(this.state, TOKEN_TYPES.LPAREN);
    const elifCondition = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RPAREN);
    skipNewlines(this.state);
    const body = this.parseBlock();
    end = spanFrom(this.state, start);
    skipNewlines(this.state);
    elifBranches.push({ condition: elifCondition, body });
  }

  let elseBranch: StatementNode[] | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    skipNewlines(this.state);
    elseBranch = this.parseBlock();
    end = spanFrom(this.state, start);
  }

  return {
    type: 'If',
    condition,
    thenBranch,
    elifBranches,
    elseBranch,
    span: end,
  };
};

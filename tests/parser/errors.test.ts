/**
 * Parser Tests: Errors
 * Fail-fast error reporting with kinds, messages and positions
 */

import { describe, expect, it } from 'vitest';
import { MAX_NESTING_DEPTH, parse } from '../../src/parser/index.js';
import { ParseError } from '../../src/error-classes.js';

/** Parse and return the thrown ParseError */
function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected a parse error for: ${source}`);
}

describe('Parser: errors', () => {
  describe('identifier validation', () => {
    it('rejects a lowercase Set target', () => {
      const err = parseError('Set x 1');
      expect(err.kind).toBe('invalid-identifier');
      expect(err.errorId).toBe('AETHER-P006');
      expect(err.location).toEqual({ line: 1, column: 5, offset: 4 });
      expect(err.toData().message).toBe(
        "Invalid identifier 'x' - variable and function names must use UPPER_SNAKE_CASE (e.g. MY_VAR, CALCULATE_SUM)"
      );
      expect(err.message).toMatch(/ at 1:5$/);
    });

    it('accepts an uppercase Set target', () => {
      expect(() => parse('Set X 1')).not.toThrow();
    });

    it('rejects mixed-case function, generator and lazy names', () => {
      expect(parseError('Func calcSum() {}').context).toEqual({
        name: 'calcSum',
        reason:
          'variable and function names must use UPPER_SNAKE_CASE (e.g. MY_VAR, CALCULATE_SUM)',
      });
      expect(parseError('Generator Gen() {}').kind).toBe('invalid-identifier');
      expect(parseError('Lazy lazy_val(1)').kind).toBe('invalid-identifier');
    });

    it('rejects a numeral in place of a declaration name', () => {
      const err = parseError('Set Ⅻ 1');
      expect(err.kind).toBe('unexpected-token');
      expect(err.toData().message).toBe(
        "Expected identifier, found illegal character 'Ⅻ'"
      );
    });

    it('rejects a keyword in place of a declaration name', () => {
      const err = parseError('Set Return 1');
      expect(err.kind).toBe('unexpected-token');
      expect(err.toData().message).toBe("Expected identifier, found 'Return'");
    });
  });

  describe('unexpected tokens', () => {
    it('reports the missing closer in a call', () => {
      const err = parseError('PRINT(1 2)');
      expect(err.kind).toBe('unexpected-token');
      expect(err.toData().message).toBe("Expected ')', found number 2");
      expect(err.location).toEqual({ line: 1, column: 9, offset: 8 });
    });

    it('reports a non-key token in a dict', () => {
      expect(parseError('{1: 2}').toData().message).toBe(
        'Expected identifier or string, found number 1'
      );
    });

    it('reports a missing index closer in SetIndex', () => {
      expect(parseError('Set ARR[0 5').toData().message).toBe(
        "Expected ']' for index access, found number 5"
      );
    });

    it('reports a bad lambda binder', () => {
      expect(parseError('Lambda 5 -> 1').toData().message).toBe(
        "Expected identifier or '(', found number 5"
      );
    });
  });

  describe('end of input', () => {
    it('names the expected token and the unclosed delimiter', () => {
      const err = parseError('Set X (1 + 2');
      expect(err.kind).toBe('unexpected-eof');
      expect(err.errorId).toBe('AETHER-P002');
      expect(err.toData().message).toBe(
        "Unexpected end of input: Expected ')'. Check for an unclosed '('"
      );
      expect(err.location).toEqual({ line: 1, column: 13, offset: 12 });
    });

    it('reports an unclosed block', () => {
      expect(parseError('While (True) {\n  Break\n').toData().message).toBe(
        "Unexpected end of input: Expected '}'. Check for an unclosed '{'"
      );
    });

    it('reports a missing import path', () => {
      expect(parseError('Import X From').toData().message).toBe(
        'Unexpected end of input: Expected string'
      );
    });
  });

  describe('invalid expressions and statements', () => {
    it('reports an unexpected character', () => {
      const err = parseError('Set X @');
      expect(err.kind).toBe('invalid-expression');
      expect(err.toData().message).toBe(
        "Invalid expression - unexpected character '@'"
      );
      expect(err.location.column).toBe(7);
    });

    it('reports an unterminated string', () => {
      expect(parseError('Set X "abc').toData().message).toBe(
        'Invalid expression - unterminated string literal'
      );
    });

    it('reports a token that cannot start an expression', () => {
      expect(parseError('Set X )').toData().message).toBe(
        "Invalid expression - Unexpected token in expression: ')'"
      );
    });

    it('reports a malformed numeral', () => {
      const err = parseError('Set X ٣');
      expect(err.kind).toBe('invalid-number');
      expect(err.toData().message).toBe('Invalid number: ٣');
    });

    it('rejects reserved Try and Catch', () => {
      expect(parseError('Try { }').toData().message).toBe(
        "Invalid statement - 'Try' is reserved but not supported"
      );
      expect(parseError('Catch').kind).toBe('invalid-statement');
    });

    it('rejects Else without If and Case outside Switch', () => {
      expect(parseError('Else { }').toData().message).toBe(
        "Invalid statement - 'Else' without a preceding If"
      );
      expect(parseError('Case 1:').toData().message).toBe(
        "Invalid statement - 'Case' outside of a Switch"
      );
    });

    it('rejects statements directly inside a Switch body', () => {
      const err = parseError('Switch (X) {\n  PRINT(X)\n}');
      expect(err.toData().message).toBe(
        "Invalid statement - expected 'Case' or 'Default' in Switch body"
      );
      expect(err.location).toEqual({ line: 2, column: 3, offset: 15 });
    });
  });

  describe('fail-fast', () => {
    it('reports only the first of several errors', () => {
      const err = parseError('Set x 1\nSet y 2\nPRINT(');
      expect(err.location.line).toBe(1);
      expect(err.context).toMatchObject({ name: 'x' });
    });

    it('reports an error after valid statements at its own position', () => {
      const err = parseError('Set A 1\nSet B 2\nSet c 3');
      expect(err.location).toEqual({ line: 3, column: 5, offset: 20 });
    });
  });

  describe('nesting depth', () => {
    const parens = (depth: number) =>
      '('.repeat(depth) + '1' + ')'.repeat(depth);

    it('accepts expressions nested up to the limit', () => {
      expect(MAX_NESTING_DEPTH).toBe(256);
      expect(() => parse(parens(255))).not.toThrow();
    });

    it('rejects deeper expressions with a parse error', () => {
      const err = parseError(parens(256));
      expect(err.kind).toBe('invalid-expression');
      expect(err.toData().message).toBe(
        'Invalid expression - nesting deeper than 256 levels'
      );
      expect(err.location).toEqual({ line: 1, column: 257, offset: 256 });
    });

    it('reports runaway nesting instead of overflowing the stack', () => {
      expect(parseError('('.repeat(20000)).location.column).toBe(257);
    });

    it('counts nested blocks', () => {
      const err = parseError('While (True) {\n'.repeat(300));
      expect(err.kind).toBe('invalid-expression');
      expect(err.location).toEqual({ line: 257, column: 8, offset: 3847 });
    });
  });
});

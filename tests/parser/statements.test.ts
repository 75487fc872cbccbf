/**
 * Parser Tests: Statements
 * Declarations, control flow and modules
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/parser/index.js';

const num = (value: number) => ({ type: 'NumberLiteral', value });
const id = (name: string) => ({ type: 'Identifier', name });

describe('Parser: statements', () => {
  describe('Set', () => {
    it('parses a Set statement with spans', () => {
      expect(parse('Set TOTAL 42')).toEqual([
        {
          type: 'Set',
          name: 'TOTAL',
          nameSpan: {
            start: { line: 1, column: 5, offset: 4 },
            end: { line: 1, column: 10, offset: 9 },
          },
          value: {
            type: 'NumberLiteral',
            value: 42,
            span: {
              start: { line: 1, column: 11, offset: 10 },
              end: { line: 1, column: 13, offset: 12 },
            },
          },
          span: {
            start: { line: 1, column: 1, offset: 0 },
            end: { line: 1, column: 13, offset: 12 },
          },
        },
      ]);
    });

    it('treats a spaced bracket as an array value', () => {
      expect(parse('Set ARR [1, 2, 3]')).toMatchObject([
        {
          type: 'Set',
          name: 'ARR',
          value: {
            type: 'ArrayLiteral',
            elements: [num(1), num(2), num(3)],
          },
        },
      ]);
    });

    it('treats an unspaced bracket as index assignment', () => {
      expect(parse('Set ARR[0] 5')).toMatchObject([
        {
          type: 'SetIndex',
          object: id('ARR'),
          index: num(0),
          value: num(5),
        },
      ]);
    });

    it('keeps 16-digit integers exact', () => {
      expect(parse('Set BIG 9999999999999999')).toMatchObject([
        {
          type: 'Set',
          value: { type: 'BigIntegerLiteral', digits: '9999999999999999' },
        },
      ]);
    });

    it('accepts an If expression as a value', () => {
      expect(parse('Set MAX If (A > B) { A } Else { B }')).toMatchObject([
        {
          type: 'Set',
          name: 'MAX',
          value: {
            type: 'If',
            thenBranch: [{ type: 'ExpressionStatement', expression: id('A') }],
            elseBranch: [{ type: 'ExpressionStatement', expression: id('B') }],
          },
        },
      ]);
    });

    it('accepts uppercase letters beyond ASCII', () => {
      expect(parse('Set ÄPFEL 1')).toMatchObject([{ type: 'Set', name: 'ÄPFEL' }]);
    });
  });

  describe('functions', () => {
    it('parses a function definition', () => {
      const source = 'Func ADD(a, b) {\n  Return a + b\n}';
      expect(parse(source)).toMatchObject([
        {
          type: 'FuncDef',
          name: 'ADD',
          params: ['a', 'b'],
          body: [
            { type: 'Return', value: { op: '+', left: id('a'), right: id('b') } },
          ],
          span: {
            start: { line: 1, column: 1 },
            end: { line: 3, column: 2 },
          },
        },
      ]);
    });

    it('allows the body brace on the next line and a trailing comma', () => {
      expect(parse('Func PAIR(a, b,)\n{\n}')).toMatchObject([
        { type: 'FuncDef', params: ['a', 'b'], body: [] },
      ]);
    });

    it('parses a generator definition', () => {
      expect(parse('Generator COUNT(n) { Yield n }')).toMatchObject([
        {
          type: 'GeneratorDef',
          name: 'COUNT',
          params: ['n'],
          body: [{ type: 'Yield', value: id('n') }],
        },
      ]);
    });

    it('gives a bare Return a Null value', () => {
      expect(parse('Func STOP() {\n  Return\n}')).toMatchObject([
        { type: 'FuncDef', body: [{ type: 'Return', value: { type: 'NullLiteral' } }] },
      ]);
      expect(parse('Func STOP() { Return }')).toMatchObject([
        { body: [{ type: 'Return', value: { type: 'NullLiteral' } }] },
      ]);
    });

    it('parses a lazy definition', () => {
      expect(parse('Lazy TOTAL(A + B)')).toMatchObject([
        { type: 'LazyDef', name: 'TOTAL', expression: { op: '+' } },
      ]);
    });
  });

  describe('loops', () => {
    it('parses While', () => {
      expect(parse('While (I < 10) {\n  Set I I + 1\n}')).toMatchObject([
        {
          type: 'While',
          condition: { op: '<' },
          body: [{ type: 'Set', name: 'I', value: { op: '+' } }],
        },
      ]);
    });

    it('parses a single-binder For', () => {
      expect(parse('For ITEM In ITEMS { PRINT(ITEM) }')).toMatchObject([
        {
          type: 'For',
          variable: 'ITEM',
          iterable: id('ITEMS'),
          body: [{ expression: { type: 'Call', callee: id('PRINT') } }],
        },
      ]);
    });

    it('parses an indexed For', () => {
      expect(parse('For I, V In RANGE(0, 10) { PRINT(I, V) }')).toMatchObject([
        {
          type: 'ForIndexed',
          indexVar: 'I',
          valueVar: 'V',
          iterable: { type: 'Call', callee: id('RANGE'), args: [num(0), num(10)] },
          body: [
            {
              type: 'ExpressionStatement',
              expression: { type: 'Call', callee: id('PRINT'), args: [id('I'), id('V')] },
            },
          ],
        },
      ]);
    });

    it('parses Break and Continue', () => {
      expect(parse('While (True) { Break; Continue }')).toMatchObject([
        { body: [{ type: 'Break' }, { type: 'Continue' }] },
      ]);
    });
  });

  describe('Switch', () => {
    it('splits case bodies at the next Case or Default', () => {
      const source = [
        'Switch (X) {',
        '  Case 1:',
        '    PRINT("one")',
        '    PRINT("uno")',
        '  Case 2: PRINT("two")',
        '  Default:',
        '    PRINT("other")',
        '}',
      ].join('\n');

      expect(parse(source)).toMatchObject([
        {
          type: 'Switch',
          discriminant: id('X'),
          cases: [
            { test: num(1), body: [{ type: 'ExpressionStatement' }, { type: 'ExpressionStatement' }] },
            { test: num(2), body: [{ type: 'ExpressionStatement' }] },
          ],
          defaultBody: [{ type: 'ExpressionStatement' }],
        },
      ]);
    });

    it('allows a Switch without Default', () => {
      expect(parse('Switch (X) { Case "a": Break }')).toMatchObject([
        { type: 'Switch', cases: [{ body: [{ type: 'Break' }] }], defaultBody: null },
      ]);
    });
  });

  describe('modules', () => {
    it('parses a braced import with aliases', () => {
      expect(parse('Import { SIN, COS As COSINE } From "math"')).toMatchObject([
        {
          type: 'Import',
          names: ['SIN', 'COS'],
          aliases: [null, 'COSINE'],
          path: 'math',
        },
      ]);
    });

    it('parses a single import with alias', () => {
      expect(parse('Import MATH As M From "lib/math"')).toMatchObject([
        { type: 'Import', names: ['MATH'], aliases: ['M'], path: 'lib/math' },
      ]);
    });

    it('parses Export', () => {
      expect(parse('Export TOTAL')).toMatchObject([{ type: 'Export', name: 'TOTAL' }]);
    });
  });

  describe('program', () => {
    it('keeps statements in source order across separators', () => {
      const program = parse('\n\nSet A 1; Set B 2\n\nThrow "bad"\n');
      expect(program.map((s) => s.type)).toEqual(['Set', 'Set', 'Throw']);
    });

    it('parses an empty program', () => {
      expect(parse('')).toEqual([]);
      expect(parse('// only a comment\n')).toEqual([]);
    });
  });
});

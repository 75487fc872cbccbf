/**
 * Symbol Table Tests
 * Extraction, lookup and outline of declared names
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/parser/index.js';
import { SymbolTable, spanToRange } from '../../src/symbols/index.js';

const SAMPLE = [
  '// Running total',
  '// across items',
  'Set TOTAL 0',
  '',
  '/* Adds two numbers */',
  'Func ADD(a, b) {',
  '  Set SUM a + b',
  '  Return SUM',
  '}',
  'Lazy NEXT(TOTAL + 1)',
  'For ITEM In ITEMS {',
  '  Set LOOP_VAR ITEM',
  '}',
  '/*',
  ' * Counts upward.',
  ' * Forever.',
  ' */',
  'Generator COUNTER(start) {',
  '  Yield start',
  '}',
].join('\n');

const table = (source: string) => SymbolTable.fromProgram(parse(source), source);

const range = (sl: number, sc: number, el: number, ec: number) => ({
  start: { line: sl, character: sc },
  end: { line: el, character: ec },
});

describe('SymbolTable', () => {
  describe('fromProgram', () => {
    const symbols = table(SAMPLE);

    it('collects variables in declaration order', () => {
      expect(symbols.variables.map((v) => v.name)).toEqual([
        'TOTAL',
        'SUM',
        'NEXT',
        'LOOP_VAR',
      ]);
    });

    it('records a variable with its leading comment', () => {
      expect(symbols.variables[0]).toEqual({
        name: 'TOTAL',
        kind: 13,
        range: range(2, 4, 2, 9),
        selectionRange: range(2, 4, 2, 9),
        documentation: 'Running total\nacross items',
        detail: 'Variable: TOTAL',
      });
    });

    it('ranges variables over their names', () => {
      expect(symbols.variables[1]?.range).toEqual(range(6, 6, 6, 9));
      expect(symbols.variables[2]?.range).toEqual(range(9, 5, 9, 9));
      expect(symbols.variables[3]?.range).toEqual(range(11, 6, 11, 14));
    });

    it('labels lazy definitions', () => {
      expect(symbols.variables[2]?.detail).toBe('Lazy: NEXT');
    });

    it('leaves documentation empty without a comment', () => {
      expect(symbols.variables[1]?.documentation).toBe('');
      expect(symbols.variables[2]?.documentation).toBe('');
    });

    it('records a function over its whole declaration', () => {
      expect(symbols.functions[0]).toEqual({
        name: 'ADD',
        kind: 12,
        range: range(5, 0, 8, 1),
        selectionRange: range(5, 5, 5, 8),
        documentation: 'Function: ADD(a, b)\n\nAdds two numbers',
        detail: 'Function: ADD(a, b) { ... }',
      });
    });

    it('documents a generator from a multi-line block comment', () => {
      expect(symbols.functions[1]).toMatchObject({
        name: 'COUNTER',
        range: range(17, 0, 19, 1),
        selectionRange: range(17, 10, 17, 17),
        documentation: 'Generator: COUNTER(start)\n\nCounts upward.\nForever.',
        detail: 'Generator: COUNTER(start) { ... }',
      });
    });

    it('collects definitions nested in other bodies', () => {
      const source = [
        'While (True) {',
        '  Set IN_WHILE 1',
        '}',
        'If (A) { Set IN_THEN 1 } Elif (B) { Set IN_ELIF 2 } Else { Set IN_ELSE 3 }',
        'Switch (X) {',
        '  Case 1: Set IN_CASE 1',
        '  Default: Set IN_DEFAULT 2',
        '}',
        'Func(x) {',
        '  Set IN_LAMBDA x',
        '}',
      ].join('\n');

      expect(table(source).variables.map((v) => v.name)).toEqual([
        'IN_WHILE',
        'IN_THEN',
        'IN_ELIF',
        'IN_ELSE',
        'IN_CASE',
        'IN_DEFAULT',
        'IN_LAMBDA',
      ]);
    });

    it('returns an empty table for an empty program', () => {
      const empty = table('');
      expect(empty.variables).toEqual([]);
      expect(empty.functions).toEqual([]);
    });

    it('freezes its symbol lists', () => {
      expect(Object.isFrozen(symbols.variables)).toBe(true);
      expect(Object.isFrozen(symbols.functions)).toBe(true);
    });
  });

  describe('findAtPosition', () => {
    const symbols = table(SAMPLE);

    it('finds a variable by its name range', () => {
      expect(symbols.findAtPosition({ line: 2, character: 5 })?.name).toBe('TOTAL');
    });

    it('includes the end character', () => {
      expect(symbols.findAtPosition({ line: 2, character: 9 })?.name).toBe('TOTAL');
      expect(symbols.findAtPosition({ line: 2, character: 10 })).toBeNull();
    });

    it('prefers variables over the enclosing function', () => {
      expect(symbols.findAtPosition({ line: 6, character: 7 })?.name).toBe('SUM');
    });

    it('falls back to the enclosing function', () => {
      expect(symbols.findAtPosition({ line: 5, character: 2 })?.name).toBe('ADD');
      expect(symbols.findAtPosition({ line: 7, character: 4 })?.name).toBe('ADD');
    });

    it('returns null outside every symbol', () => {
      expect(symbols.findAtPosition({ line: 3, character: 0 })).toBeNull();
    });
  });

  describe('findDefinition', () => {
    const symbols = table(SAMPLE);

    it('returns the symbol range in the given document', () => {
      expect(
        symbols.findDefinition({ line: 2, character: 5 }, 'file:///main.ae')
      ).toEqual({ uri: 'file:///main.ae', range: range(2, 4, 2, 9) });
    });

    it('returns null without a symbol', () => {
      expect(
        symbols.findDefinition({ line: 3, character: 0 }, 'file:///main.ae')
      ).toBeNull();
    });
  });

  describe('toDocumentSymbols', () => {
    it('lists variables before functions', () => {
      const outline = table(SAMPLE).toDocumentSymbols('file:///main.ae');
      expect(outline.map((s) => [s.name, s.kind])).toEqual([
        ['TOTAL', 13],
        ['SUM', 13],
        ['NEXT', 13],
        ['LOOP_VAR', 13],
        ['ADD', 12],
        ['COUNTER', 12],
      ]);
      expect(outline[4]?.location).toEqual({
        uri: 'file:///main.ae',
        range: range(5, 0, 8, 1),
      });
    });
  });

  describe('renameSymbol', () => {
    it('produces no edit', () => {
      expect(
        table(SAMPLE).renameSymbol({ line: 2, character: 5 }, 'GRAND_TOTAL', 'file:///main.ae')
      ).toBeNull();
    });
  });

  describe('spanToRange', () => {
    it('shifts both ends to 0-based positions', () => {
      expect(
        spanToRange({
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 4, offset: 3 },
        })
      ).toEqual(range(0, 0, 0, 3));
    });
  });
});

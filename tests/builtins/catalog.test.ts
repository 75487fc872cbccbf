/**
 * Built-in Catalog Tests
 */

import { describe, expect, it } from 'vitest';
import {
  BUILTINS,
  BUILTIN_CATEGORIES,
  KEYWORD_DOCS,
  builtinsInCategory,
  findBuiltin,
  parseBuiltinEntries,
  parseKeywordEntries,
} from '../../src/builtins/index.js';

describe('built-in catalog', () => {
  it('loads every built-in function', () => {
    expect(BUILTINS).toHaveLength(53);
    expect(BUILTINS[0]?.name).toBe('PRINTLN');
    expect(BUILTINS[BUILTINS.length - 1]?.name).toBe('SLEEP');
  });

  it('has unique names', () => {
    expect(new Set(BUILTINS.map((b) => b.name)).size).toBe(BUILTINS.length);
  });

  it('lists categories in first-appearance order', () => {
    expect(BUILTIN_CATEGORIES).toEqual([
      'IO',
      'Array',
      'String',
      'Math',
      'Type',
      'Dict',
      'JSON',
      'DateTime',
    ]);
  });

  it('groups built-ins by category', () => {
    expect(builtinsInCategory('Math')).toHaveLength(12);
    expect(builtinsInCategory('Nope')).toEqual([]);
  });

  it('finds a built-in by exact name', () => {
    expect(findBuiltin('PRINTLN')).toEqual({
      name: 'PRINTLN',
      signature: 'PRINTLN(value...)',
      description: 'Print values to the console followed by a newline',
      category: 'IO',
      examples: ['PRINTLN("Hello World")', 'PRINTLN(MY_VAR, MY_VAR2)'],
    });
    expect(findBuiltin('RANGE')?.signature).toBe('RANGE(start, end)');
  });

  it('is case-sensitive', () => {
    expect(findBuiltin('println')).toBeNull();
    expect(findBuiltin('NOT_A_BUILTIN')).toBeNull();
  });

  it('freezes entries', () => {
    expect(Object.isFrozen(BUILTINS)).toBe(true);
    expect(Object.isFrozen(BUILTINS[0])).toBe(true);
  });
});

describe('keyword docs', () => {
  it('loads every keyword in completion order', () => {
    expect(KEYWORD_DOCS).toHaveLength(26);
    expect(KEYWORD_DOCS.map((k) => k.keyword).slice(0, 4)).toEqual([
      'Set',
      'Func',
      'Return',
      'If',
    ]);
    expect(KEYWORD_DOCS[0]).toEqual({
      keyword: 'Set',
      description: 'Variable assignment',
      example: 'Set VAR value',
    });
    expect(KEYWORD_DOCS[KEYWORD_DOCS.length - 1]?.keyword).toBe('Null');
  });
});

describe('parseBuiltinEntries', () => {
  const entry = {
    name: 'ABS',
    signature: 'ABS(x)',
    description: 'Absolute value',
    category: 'Math',
  };

  it('defaults examples to an empty list', () => {
    expect(parseBuiltinEntries([entry])[0]?.examples).toEqual([]);
  });

  it('rejects data that is not a list', () => {
    expect(() => parseBuiltinEntries({ ABS: entry })).toThrow(
      'builtins.yaml: expected a list of entries'
    );
  });

  it('rejects an entry that is not a mapping', () => {
    expect(() => parseBuiltinEntries([entry, 'ABS'])).toThrow(
      'builtins.yaml[1]: entry must be a mapping'
    );
  });

  it('names the missing field', () => {
    expect(() => parseBuiltinEntries([{ ...entry, signature: '' }])).toThrow(
      "builtins.yaml[0]: 'signature' must be a non-empty string"
    );
  });

  it('rejects duplicate names', () => {
    expect(() => parseBuiltinEntries([entry, entry], 'test.yaml')).toThrow(
      "test.yaml[1]: duplicate builtin 'ABS'"
    );
  });

  it('rejects non-string examples', () => {
    expect(() => parseBuiltinEntries([{ ...entry, examples: [1] }])).toThrow(
      "builtins.yaml[0]: 'examples' must be a list of strings"
    );
  });
});

describe('literal keywords', () => {
  it('load as strings rather than YAML booleans and null', () => {
    expect(KEYWORD_DOCS.slice(-3)).toEqual([
      { keyword: 'True', description: 'Boolean true', example: 'True' },
      { keyword: 'False', description: 'Boolean false', example: 'False' },
      { keyword: 'Null', description: 'Null value', example: 'Null' },
    ]);
  });
});

describe('parseKeywordEntries', () => {
  it('rejects a keyword that is not a string', () => {
    expect(() =>
      parseKeywordEntries([
        { keyword: true, description: 'Boolean true', example: 'True' },
      ])
    ).toThrow("keywords.yaml[0]: 'keyword' must be a non-empty string");
  });

  it('names the missing field', () => {
    expect(() =>
      parseKeywordEntries([{ keyword: 'Set', description: 'Assign' }])
    ).toThrow("keywords.yaml[0]: 'example' must be a non-empty string");
  });
});

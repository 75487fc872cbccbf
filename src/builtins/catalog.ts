/**
 * Built-in Catalog
 * Static documentation for built-in functions and keywords, loaded once
 * from the YAML files under data/.
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'yaml';

// ============================================================
// TYPES
// ============================================================

export interface BuiltinFunction {
  readonly name: string;
  /** Call form shown to users, e.g. `RANGE(start, end)` */
  readonly signature: string;
  readonly description: string;
  readonly category: string;
  readonly examples: readonly string[];
}

export interface KeywordDoc {
  readonly keyword: string;
  readonly description: string;
  readonly example: string;
}

// ============================================================
// LOADING
// ============================================================

function readDataFile(name: string): unknown {
  const url = new URL(`../../data/${name}`, import.meta.url);
  return yaml.parse(readFileSync(url, 'utf-8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.every((item: unknown) => typeof item === 'string')
  );
}

function requireString(
  entry: Record<string, unknown>,
  field: string,
  file: string,
  index: number
): string {
  const value = entry[field];
  if (typeof value !== 'string' || value === '') {
    throw new TypeError(
      `${file}[${index}]: '${field}' must be a non-empty string`
    );
  }
  return value;
}

function requireList(data: unknown, file: string): unknown[] {
  if (!Array.isArray(data)) {
    throw new TypeError(`${file}: expected a list of entries`);
  }
  return data;
}

/**
 * Validate raw catalog data.
 * @throws TypeError naming the file and entry index of the first bad entry
 */
export function parseBuiltinEntries(
  data: unknown,
  file = 'builtins.yaml'
): readonly BuiltinFunction[] {
  const seen = new Set<string>();

  const entries = requireList(data, file).map((raw, index) => {
    if (!isRecord(raw)) {
      throw new TypeError(`${file}[${index}]: entry must be a mapping`);
    }
    const name = requireString(raw, 'name', file, index);
    if (seen.has(name)) {
      throw new TypeError(`${file}[${index}]: duplicate builtin '${name}'`);
    }
    seen.add(name);

    const examples = raw['examples'] ?? [];
    if (!isStringList(examples)) {
      throw new TypeError(
        `${file}[${index}]: 'examples' must be a list of strings`
      );
    }

    return Object.freeze({
      name,
      signature: requireString(raw, 'signature', file, index),
      description: requireString(raw, 'description', file, index),
      category: requireString(raw, 'category', file, index),
      examples: Object.freeze([...examples]),
    });
  });

  return Object.freeze(entries);
}

export function parseKeywordEntries(
  data: unknown,
  file = 'keywords.yaml'
): readonly KeywordDoc[] {
  const entries = requireList(data, file).map((raw, index) => {
    if (!isRecord(raw)) {
      throw new TypeError(`${file}[${index}]: entry must be a mapping`);
    }
    return Object.freeze({
      keyword: requireString(raw, 'keyword', file, index),
      description: requireString(raw, 'description', file, index),
      example: requireString(raw, 'example', file, index),
    });
  });

  return Object.freeze(entries);
}

// ============================================================
// CATALOG
// ============================================================

/** Every built-in function, in catalog order */
export const BUILTINS: readonly BuiltinFunction[] = parseBuiltinEntries(
  readDataFile('builtins.yaml')
);

/** Keyword documentation, in completion order */
export const KEYWORD_DOCS: readonly KeywordDoc[] = parseKeywordEntries(
  readDataFile('keywords.yaml')
);

const BUILTINS_BY_NAME: ReadonlyMap<string, BuiltinFunction> = new Map(
  BUILTINS.map((builtin) => [builtin.name, builtin])
);

/** Look up a built-in by exact (case-sensitive) name */
export function findBuiltin(name: string): BuiltinFunction | null {
  return BUILTINS_BY_NAME.get(name) ?? null;
}

/** Distinct categories in first-appearance order */
export const BUILTIN_CATEGORIES: readonly string[] = Object.freeze([
  ...new Set(BUILTINS.map((builtin) => builtin.category)),
]);

export function builtinsInCategory(category: string): BuiltinFunction[] {
  return BUILTINS.filter((builtin) => builtin.category === category);
}

/**
 * Hover Assembly
 */

import type { ParsedDocument } from '../document.js';
import { findBuiltin } from '../builtins/index.js';
import { builtinMarkdown } from './completion.js';
import { positionInRange, type Hover, type LspPosition } from './types.js';

const WORD_CHAR = /^[\p{L}\p{N}_]$/u;

/**
 * Identifier-like run (letters, digits, underscores) touching `position`.
 * Characters are counted as Unicode scalars.
 */
export function extractWordAtPosition(
  text: string,
  position: LspPosition
): string | null {
  const line = text.split('\n')[position.line];
  if (line === undefined) return null;

  const chars = Array.from(line);
  if (position.character > chars.length) return null;

  let start = position.character;
  while (start > 0 && WORD_CHAR.test(chars[start - 1] ?? '')) {
    start--;
  }
  let end = position.character;
  while (end < chars.length && WORD_CHAR.test(chars[end] ?? '')) {
    end++;
  }

  return start === end ? null : chars.slice(start, end).join('');
}

/**
 * Hover for a position: the declared symbol under the cursor, or else the
 * built-in named by the word under the cursor.
 *
 * A function's range spans its body, so it only wins on its own name.
 */
export function getHover(
  doc: ParsedDocument,
  position: LspPosition
): Hover | null {
  const word = extractWordAtPosition(doc.text, position);
  const symbol = doc.symbols.findAtPosition(position);
  if (
    symbol &&
    (positionInRange(position, symbol.selectionRange) || word === symbol.name)
  ) {
    const value = symbol.documentation || symbol.detail || symbol.name;
    return {
      contents: { kind: 'markdown', value },
      range: symbol.range,
    };
  }

  const builtin = word === null ? null : findBuiltin(word);
  if (!builtin) return null;

  return {
    contents: {
      kind: 'markdown',
      value: `**${builtin.signature}**\n\n${builtinMarkdown(builtin)}`,
    },
    range: null,
  };
}

/**
 * Completion Assembly
 */

import type { ParsedDocument } from '../document.js';
import type { SymbolInfo } from '../symbols/index.js';
import {
  BUILTINS,
  KEYWORD_DOCS,
  type BuiltinFunction,
  type KeywordDoc,
} from '../builtins/index.js';
import {
  COMPLETION_ITEM_KIND,
  SYMBOL_KIND,
  type CompletionItem,
  type LspPosition,
} from './types.js';

// ============================================================
// ITEM BUILDERS
// ============================================================

export function keywordCompletion(doc: KeywordDoc): CompletionItem {
  return {
    label: doc.keyword,
    kind: COMPLETION_ITEM_KIND.KEYWORD,
    detail: doc.description,
    documentation: {
      kind: 'markdown',
      value: `**${doc.keyword}**\n\n${doc.description}\n\n\`\`\`aether\n${doc.example}\n\`\`\``,
    },
    insertText: doc.keyword,
    insertTextFormat: 1,
  };
}

/** Markdown body shared by builtin completion and hover */
export function builtinMarkdown(builtin: BuiltinFunction): string {
  const parts = [
    builtin.description,
    '',
    `**Category**: ${builtin.category}`,
  ];
  if (builtin.examples.length > 0) {
    parts.push('', '**Examples**:', '```aether', ...builtin.examples, '```');
  }
  return parts.join('\n');
}

export function builtinCompletion(builtin: BuiltinFunction): CompletionItem {
  return {
    label: builtin.name,
    kind: COMPLETION_ITEM_KIND.FUNCTION,
    detail: `${builtin.signature} - ${builtin.category}`,
    documentation: { kind: 'markdown', value: builtinMarkdown(builtin) },
    insertText: `${builtin.name}($1)`,
    insertTextFormat: 2,
  };
}

export function symbolCompletion(symbol: SymbolInfo): CompletionItem {
  const isFunction = symbol.kind === SYMBOL_KIND.FUNCTION;
  return {
    label: symbol.name,
    kind: isFunction
      ? COMPLETION_ITEM_KIND.FUNCTION
      : COMPLETION_ITEM_KIND.VARIABLE,
    detail: symbol.detail ?? symbol.name,
    documentation: { kind: 'markdown', value: symbol.documentation },
    insertText: isFunction ? `${symbol.name}($1)` : symbol.name,
    insertTextFormat: isFunction ? 2 : 1,
  };
}

// ============================================================
// COMPLETION
// ============================================================

/**
 * Completion candidates: keywords, then builtins, then the document's own
 * variables and functions. Candidates are not filtered by position;
 * clients filter on the typed prefix. Names declared more than once are
 * offered once.
 */
export function getCompletions(
  doc: ParsedDocument,
  _position: LspPosition
): CompletionItem[] {
  const items = [
    ...KEYWORD_DOCS.map(keywordCompletion),
    ...BUILTINS.map(builtinCompletion),
  ];

  const seen = new Set<string>();
  for (const symbol of [...doc.symbols.variables, ...doc.symbols.functions]) {
    if (seen.has(symbol.name)) continue;
    seen.add(symbol.name);
    items.push(symbolCompletion(symbol));
  }

  return items;
}

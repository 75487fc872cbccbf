/**
 * Editor Protocol Types
 * Shapes consumed by language-server transports. Positions are 0-based.
 */

// ============================================================
// POSITIONS
// ============================================================

/** 0-based line and character */
export interface LspPosition {
  readonly line: number;
  readonly character: number;
}

export interface LspRange {
  readonly start: LspPosition;
  readonly end: LspPosition;
}

export interface LspLocation {
  readonly uri: string;
  readonly range: LspRange;
}

// ============================================================
// DIAGNOSTICS
// ============================================================

/** 1 = Error, 2 = Warning, 3 = Information */
export type LspSeverity = 1 | 2 | 3;

export const DIAGNOSTIC_SOURCES = {
  PARSER: 'aether-parser',
  LINT: 'aether-lint',
} as const;

export type DiagnosticSource =
  (typeof DIAGNOSTIC_SOURCES)[keyof typeof DIAGNOSTIC_SOURCES];

export interface LspDiagnostic {
  readonly range: LspRange;
  readonly severity: LspSeverity;
  readonly code: string;
  readonly source: DiagnosticSource;
  readonly message: string;
}

// ============================================================
// SYMBOLS
// ============================================================

export const SYMBOL_KIND = {
  FUNCTION: 12,
  VARIABLE: 13,
} as const;

export type SymbolKind = (typeof SYMBOL_KIND)[keyof typeof SYMBOL_KIND];

/** Flat outline entry */
export interface SymbolInformation {
  readonly name: string;
  readonly kind: SymbolKind;
  readonly location: LspLocation;
}

export interface TextEdit {
  readonly range: LspRange;
  readonly newText: string;
}

/** Edits keyed by document URI */
export interface WorkspaceEdit {
  readonly changes: Readonly<Record<string, readonly TextEdit[]>>;
}

// ============================================================
// COMPLETION AND HOVER
// ============================================================

export const COMPLETION_ITEM_KIND = {
  FUNCTION: 3,
  VARIABLE: 6,
  KEYWORD: 14,
} as const;

export type CompletionItemKind =
  (typeof COMPLETION_ITEM_KIND)[keyof typeof COMPLETION_ITEM_KIND];

/** 1 = plain text, 2 = snippet */
export type InsertTextFormat = 1 | 2;

export interface MarkupContent {
  readonly kind: 'markdown';
  readonly value: string;
}

export interface CompletionItem {
  readonly label: string;
  readonly kind: CompletionItemKind;
  readonly detail: string;
  readonly documentation: MarkupContent;
  readonly insertText: string;
  readonly insertTextFormat: InsertTextFormat;
}

export interface Hover {
  readonly contents: MarkupContent;
  readonly range: LspRange | null;
}

// ============================================================
// CONVERSIONS
// ============================================================

/** 1-based source location to 0-based position, saturating at zero */
export function toLspPosition(line: number, column: number): LspPosition {
  return {
    line: Math.max(0, line - 1),
    character: Math.max(0, column - 1),
  };
}

/** Whether `position` lies within `range`, both ends inclusive */
export function positionInRange(
  position: LspPosition,
  range: LspRange
): boolean {
  if (position.line < range.start.line || position.line > range.end.line) {
    return false;
  }
  if (
    position.line === range.start.line &&
    position.character < range.start.character
  ) {
    return false;
  }
  if (
    position.line === range.end.line &&
    position.character > range.end.character
  ) {
    return false;
  }
  return true;
}

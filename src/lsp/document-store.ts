/**
 * Document Store
 * Latest parse of every open document, keyed by URI, plus the editor
 * queries answered from it.
 */

import {
  emptyDocument,
  parseDocument,
  type ParsedDocument,
} from '../document.js';
import type { CheckConfig } from '../check/types.js';
import { createDefaultConfig } from '../check/config.js';
import { isUpperSnakeCase } from '../check/rules/index.js';
import { analyzeDocument } from './diagnostics.js';
import { getCompletions } from './completion.js';
import { getHover } from './hover.js';
import type {
  CompletionItem,
  Hover,
  LspDiagnostic,
  LspLocation,
  LspPosition,
  SymbolInformation,
  WorkspaceEdit,
} from './types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted after a document is (re)parsed */
export interface DocumentParseEvent {
  uri: string;
  /** Number of syntax errors (0 or 1) */
  errorCount: number;
  /** Parse time in milliseconds */
  durationMs: number;
}

/** Event emitted after diagnostics are computed */
export interface DocumentDiagnosticsEvent {
  uri: string;
  count: number;
}

export interface DocumentCloseEvent {
  uri: string;
}

export interface DocumentStoreCallbacks {
  /** Called after open and change */
  onParse?: (event: DocumentParseEvent) => void;
  /** Called each time diagnostics are requested for an open document */
  onDiagnostics?: (event: DocumentDiagnosticsEvent) => void;
  /** Called when a document is closed */
  onClose?: (event: DocumentCloseEvent) => void;
}

export interface DocumentStoreOptions {
  /** Lint configuration; every rule on by default */
  config?: CheckConfig;
  observability?: DocumentStoreCallbacks;
}

// ============================================================
// STORE
// ============================================================

/**
 * Full-text document cache. Every open or change replaces the entry for
 * its URI wholesale; the last write wins.
 */
export class DocumentStore {
  private readonly documents = new Map<string, ParsedDocument>();
  private readonly config: CheckConfig;
  private readonly observability: DocumentStoreCallbacks;

  constructor(options: DocumentStoreOptions = {}) {
    this.config = options.config ?? createDefaultConfig();
    this.observability = options.observability ?? {};
  }

  open(uri: string, text: string): ParsedDocument {
    return this.store(uri, text);
  }

  /** Replace the document's full text */
  change(uri: string, text: string): ParsedDocument {
    return this.store(uri, text);
  }

  close(uri: string): void {
    if (this.documents.delete(uri)) {
      this.observability.onClose?.({ uri });
    }
  }

  get(uri: string): ParsedDocument | undefined {
    return this.documents.get(uri);
  }

  get size(): number {
    return this.documents.size;
  }

  /** Diagnostics for an open document; empty when the URI is unknown */
  diagnostics(uri: string): LspDiagnostic[] {
    const doc = this.documents.get(uri);
    if (!doc) return [];

    const diagnostics = analyzeDocument(doc, doc.text, this.config);
    this.observability.onDiagnostics?.({ uri, count: diagnostics.length });
    return diagnostics;
  }

  hover(uri: string, position: LspPosition): Hover | null {
    const doc = this.documents.get(uri);
    return doc ? getHover(doc, position) : null;
  }

  definition(uri: string, position: LspPosition): LspLocation | null {
    const doc = this.documents.get(uri);
    return doc ? doc.symbols.findDefinition(position, uri) : null;
  }

  documentSymbols(uri: string): SymbolInformation[] | null {
    const doc = this.documents.get(uri);
    return doc ? doc.symbols.toDocumentSymbols(uri) : null;
  }

  /** Completions; an unknown URI still gets keywords and builtins */
  completions(uri: string, position: LspPosition): CompletionItem[] {
    return getCompletions(this.documents.get(uri) ?? emptyDocument(), position);
  }

  /**
   * Rename the symbol at `position`. Names that are not UPPER_SNAKE_CASE
   * are refused with null.
   */
  rename(
    uri: string,
    position: LspPosition,
    newName: string
  ): WorkspaceEdit | null {
    const doc = this.documents.get(uri);
    if (!doc || !isUpperSnakeCase(newName)) return null;
    return doc.symbols.renameSymbol(position, newName, uri);
  }

  private store(uri: string, text: string): ParsedDocument {
    const startTime = performance.now();
    const doc = parseDocument(text);
    this.documents.set(uri, doc);
    this.observability.onParse?.({
      uri,
      errorCount: doc.errors.length,
      durationMs: performance.now() - startTime,
    });
    return doc;
  }
}

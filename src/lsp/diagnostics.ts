/**
 * Diagnostics Assembler
 * Turns a parsed document into editor diagnostics: the parse error, if
 * any, otherwise the lint findings.
 */

import type { DocumentError, ParsedDocument } from '../document.js';
import type { CheckConfig, Severity } from '../check/types.js';
import { createDefaultConfig } from '../check/config.js';
import { lintSource } from '../check/linter.js';
import {
  DIAGNOSTIC_SOURCES,
  type LspDiagnostic,
  type LspSeverity,
  toLspPosition,
} from './types.js';

const LSP_SEVERITY: Record<Severity, LspSeverity> = {
  error: 1,
  warning: 2,
  info: 3,
};

// ============================================================
// PARSE ERRORS
// ============================================================

/**
 * Parse errors carry a start position only; the highlighted width is
 * guessed from the message.
 */
export function estimateErrorWidth(message: string): number {
  if (message.includes('identifier')) return 10;
  if (message.includes('Expected')) return 5;
  if (message.includes('UPPER_SNAKE_CASE')) return 15;
  return 8;
}

/** Short editor code for a parse error message */
export function errorCodeFromMessage(message: string): string {
  if (message.includes('UPPER_SNAKE_CASE')) return 'E001';
  if (message.includes('Unexpected token')) return 'E002';
  if (message.includes('Expected')) return 'E003';
  if (message.includes('Invalid expression')) return 'E004';
  return 'E000';
}

function parseErrorToDiagnostic(error: DocumentError): LspDiagnostic {
  const start = toLspPosition(error.line, error.column);
  return {
    range: {
      start,
      end: {
        line: start.line,
        character: start.character + estimateErrorWidth(error.message),
      },
    },
    severity: LSP_SEVERITY.error,
    code: errorCodeFromMessage(error.message),
    source: DIAGNOSTIC_SOURCES.PARSER,
    message: error.message,
  };
}

// ============================================================
// ANALYSIS
// ============================================================

/**
 * Diagnostics for a document.
 * Lint rules run only when the document parsed cleanly; `text` is
 * re-scanned rather than read from the AST.
 */
export function analyzeDocument(
  doc: ParsedDocument,
  text: string = doc.text,
  config: CheckConfig = createDefaultConfig()
): LspDiagnostic[] {
  const diagnostics = doc.errors.map(parseErrorToDiagnostic);
  if (doc.errors.length > 0) return diagnostics;

  for (const finding of lintSource(text, config)) {
    diagnostics.push({
      range: {
        start: toLspPosition(finding.location.line, finding.location.column),
        end: toLspPosition(finding.end.line, finding.end.column),
      },
      severity: LSP_SEVERITY[finding.severity],
      code: finding.editorCode,
      source: DIAGNOSTIC_SOURCES.LINT,
      message: finding.message,
    });
  }

  return diagnostics;
}

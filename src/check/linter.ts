/**
 * Linter
 * Runs every enabled lint rule over a source text.
 */

import type { CheckConfig, Diagnostic } from './types.js';
import { LINT_RULES } from './rules/index.js';
import {
  createDefaultConfig,
  effectiveSeverity,
  isRuleEnabled,
} from './config.js';
import { tokenize } from '../lexer/index.js';

/**
 * Sort diagnostics by line, then column.
 */
export function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return diagnostics.sort((a, b) => {
    if (a.location.line !== b.location.line) {
      return a.location.line - b.location.line;
    }
    return a.location.column - b.location.column;
  });
}

/**
 * Lint source text.
 * Callers are expected to lint only sources that parse; the rules work
 * on tokens and do not need the AST.
 */
export function lintSource(
  source: string,
  config: CheckConfig = createDefaultConfig()
): Diagnostic[] {
  const context = { source, tokens: tokenize(source) };
  const diagnostics: Diagnostic[] = [];

  for (const rule of LINT_RULES) {
    if (!isRuleEnabled(config, rule.code)) continue;

    const severity = effectiveSeverity(config, rule.code, rule.severity);
    for (const diagnostic of rule.validate(context)) {
      diagnostics.push({ ...diagnostic, severity });
    }
  }

  return sortDiagnostics(diagnostics);
}

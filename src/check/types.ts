/**
 * Check Types
 * Type definitions for the aether-check lint pass.
 */

import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { Token } from '../token-types.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration; 'warn' reports at warning severity */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/**
 * Suggested replacement for a diagnostic.
 */
export interface Fix {
  /** Human-readable description of what the fix does */
  readonly description: string;
  /** Whether the fix can be safely applied automatically */
  readonly applicable: boolean;
  /** Source range to replace */
  readonly range: SourceSpan;
  /** Replacement text */
  readonly replacement: string;
}

/**
 * A single issue found by a lint rule.
 */
export interface Diagnostic {
  /** Start of the offending text */
  readonly location: SourceLocation;
  /** End of the offending text */
  readonly end: SourceLocation;
  readonly severity: Severity;
  /** Rule code (e.g., NAMING_UPPER_SNAKE_CASE) */
  readonly code: string;
  /** Short code shown by editors (e.g., W001) */
  readonly editorCode: string;
  readonly message: string;
  /** Source line containing the issue */
  readonly context: string;
  readonly fix: Fix | null;
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/**
 * Configuration for check rules and severity overrides.
 */
export interface CheckConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Record<string, RuleState>;
  /** Severity overrides by rule code */
  readonly severity: Record<string, Severity>;
}

// ============================================================
// LINT CONTEXT
// ============================================================

/**
 * Input shared by every rule in one lint pass.
 */
export interface LintContext {
  /** Original source text */
  readonly source: string;
  /** Fresh tokenization of the source, EOF included */
  readonly tokens: readonly Token[];
}

// ============================================================
// LINT RULES
// ============================================================

/** Rule category for grouping and organization */
export type RuleCategory = 'naming';

/**
 * Lint rule interface.
 * Rules are stateless and return diagnostics; they never throw.
 * Severity on returned diagnostics is the rule default; the linter
 * applies configured overrides.
 */
export interface LintRule {
  /** Unique rule code (e.g., NAMING_UPPER_SNAKE_CASE) */
  readonly code: string;

  /** Short code shown by editors (e.g., W001) */
  readonly editorCode: string;

  /** Rule category for grouping */
  readonly category: RuleCategory;

  /** Default severity level */
  readonly severity: Severity;

  /** One-line summary for help output */
  readonly description: string;

  validate(context: LintContext): Diagnostic[];
}

/**
 * Naming Convention Rules
 * Enforces UPPER_SNAKE_CASE for declared variables and functions.
 */

import type { Diagnostic, LintContext, LintRule } from '../types.js';
import type { Token } from '../../token-types.js';
import { TOKEN_TYPES } from '../../token-types.js';
import { extractContextLine } from './helpers.js';

// ============================================================
// NAMING VALIDATION
// ============================================================

/** Keywords whose following identifier is a declaration */
const DECLARING_KEYWORDS = new Set<string>([
  TOKEN_TYPES.SET,
  TOKEN_TYPES.FUNC,
  TOKEN_TYPES.GENERATOR,
  TOKEN_TYPES.LAZY,
]);

/**
 * Check if a name follows UPPER_SNAKE_CASE.
 * Valid: TOTAL, MY_VAR, _TMP, ITEM2
 * Invalid: total, myVar, 2ND, ÄPFEL
 */
export function isUpperSnakeCase(name: string): boolean {
  return /^[A-Z_][A-Z0-9_]*$/.test(name);
}

/** Suggested replacement for a misnamed declaration */
export function suggestUpperSnakeCase(name: string): string {
  return name.toUpperCase();
}

function createNamingDiagnostic(
  token: Token,
  context: LintContext
): Diagnostic {
  const name = token.value;
  const suggestion = suggestUpperSnakeCase(name);

  return {
    location: token.span.start,
    end: token.span.end,
    severity: 'warning',
    code: NAMING_UPPER_SNAKE_CASE.code,
    editorCode: NAMING_UPPER_SNAKE_CASE.editorCode,
    message: `Name '${name}' should use UPPER_SNAKE_CASE\nSuggestion: ${suggestion}`,
    context: extractContextLine(token.span.start.line, context.source),
    fix: {
      description: `Rename '${name}' to '${suggestion}'`,
      // Uses of the old name are not renamed with it
      applicable: false,
      range: token.span,
      replacement: suggestion,
    },
  };
}

// ============================================================
// NAMING_UPPER_SNAKE_CASE RULE
// ============================================================

/**
 * Flags identifiers directly after Set, Func, Generator or Lazy that are
 * not ASCII UPPER_SNAKE_CASE.
 *
 * Works on tokens rather than the AST, so every declaration is seen even
 * where the parser would accept a name (non-ASCII uppercase letters).
 */
export const NAMING_UPPER_SNAKE_CASE: LintRule = {
  code: 'NAMING_UPPER_SNAKE_CASE',
  editorCode: 'W001',
  category: 'naming',
  severity: 'warning',
  description: 'Declared variables and functions use UPPER_SNAKE_CASE',

  validate(context: LintContext): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    let previous: Token | null = null;

    for (const token of context.tokens) {
      if (
        token.type === TOKEN_TYPES.IDENTIFIER &&
        previous !== null &&
        DECLARING_KEYWORDS.has(previous.type) &&
        !isUpperSnakeCase(token.value)
      ) {
        diagnostics.push(createNamingDiagnostic(token, context));
      }
      previous = token;
    }

    return diagnostics;
  },
};

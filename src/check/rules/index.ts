/**
 * Lint Rules Registry
 * Barrel export for all lint rules.
 */

import type { LintRule } from '../types.js';
import { NAMING_UPPER_SNAKE_CASE } from './naming.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export {
  NAMING_UPPER_SNAKE_CASE,
  isUpperSnakeCase,
  suggestUpperSnakeCase,
} from './naming.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/**
 * All registered lint rules, applied in order by the linter.
 */
export const LINT_RULES: readonly LintRule[] = [NAMING_UPPER_SNAKE_CASE];

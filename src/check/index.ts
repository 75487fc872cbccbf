/**
 * Check Module
 * Public API for the aether-check lint pass.
 */

export type {
  CheckConfig,
  Diagnostic,
  Fix,
  LintContext,
  LintRule,
  RuleCategory,
  RuleState,
  Severity,
} from './types.js';

export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  effectiveSeverity,
  findConfigFile,
  isRuleEnabled,
  loadConfig,
  resolveConfig,
} from './config.js';

export { lintSource, sortDiagnostics } from './linter.js';

export {
  LINT_RULES,
  NAMING_UPPER_SNAKE_CASE,
  isUpperSnakeCase,
  suggestUpperSnakeCase,
} from './rules/index.js';

export { extractContextLine } from './rules/helpers.js';

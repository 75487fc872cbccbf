/**
 * Configuration Loader for aether-check
 * Loads and validates .aether-check.yaml (or .yml / .json) configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { CheckConfig, RuleState, Severity } from './types.js';
import { LINT_RULES } from './rules/index.js';
import { CheckConfigError } from '../error-classes.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order. YAML is a superset of JSON. */
export const CONFIG_FILE_NAMES = [
  '.aether-check.yaml',
  '.aether-check.yml',
  '.aether-check.json',
] as const;

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled at their
 * default severity.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const rule of LINT_RULES) {
    rules[rule.code] = 'on';
    severity[rule.code] = rule.severity;
  }

  return { rules, severity };
}

// ============================================================
// VALIDATION
// ============================================================

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertKnownRule(code: string, known: ReadonlySet<string>): void {
  if (!known.has(code)) {
    throw new CheckConfigError(`unknown rule ${code}`, { code });
  }
}

/**
 * Validate parsed configuration data and merge it over the defaults.
 * Throws CheckConfigError with "Invalid configuration: {reason}".
 */
export function resolveConfig(data: unknown): CheckConfig {
  // An empty YAML document parses to null
  if (data === null || data === undefined) return createDefaultConfig();

  if (!isPlainObject(data)) {
    throw new CheckConfigError('must be an object');
  }

  const defaults = createDefaultConfig();
  const known = new Set(LINT_RULES.map((r) => r.code));
  const rules: Record<string, RuleState> = { ...defaults.rules };
  const severity: Record<string, Severity> = { ...defaults.severity };

  if ('rules' in data) {
    const section = data['rules'];
    if (!isPlainObject(section)) {
      throw new CheckConfigError('rules must be an object');
    }
    for (const [code, state] of Object.entries(section)) {
      if (!isRuleState(state)) {
        throw new CheckConfigError(
          `rule ${code} has invalid state "${String(state)}" (must be 'on', 'off', or 'warn')`,
          { code }
        );
      }
      assertKnownRule(code, known);
      rules[code] = state;
    }
  }

  if ('severity' in data) {
    const section = data['severity'];
    if (!isPlainObject(section)) {
      throw new CheckConfigError('severity must be an object');
    }
    for (const [code, sev] of Object.entries(section)) {
      if (!isSeverity(sev)) {
        throw new CheckConfigError(
          `rule ${code} has invalid severity "${String(sev)}" (must be 'error', 'warning', or 'info')`,
          { code }
        );
      }
      assertKnownRule(code, known);
      severity[code] = sev;
    }
  }

  return { rules, severity };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Find the configuration file in a directory.
 * @returns Absolute path, or null when none of CONFIG_FILE_NAMES exists
 */
export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Load configuration from the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CheckConfig object, or null if no file found
 * @throws CheckConfigError if the file cannot be read or parsed, or names
 *   an unknown rule
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const configPath = findConfigFile(cwd);
  if (configPath === null) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new CheckConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`,
      { path: configPath }
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new CheckConfigError(
      `invalid syntax (${err instanceof Error ? err.message : String(err)})`,
      { path: configPath }
    );
  }

  return resolveConfig(parsedData);
}

// ============================================================
// RULE QUERIES
// ============================================================

/** Whether a rule runs under this configuration ('on' or 'warn') */
export function isRuleEnabled(config: CheckConfig, code: string): boolean {
  const state = config.rules[code];
  return state === 'on' || state === 'warn';
}

/**
 * Effective severity of a rule: 'warn' forces warning, otherwise the
 * configured override, otherwise the rule default.
 */
export function effectiveSeverity(
  config: CheckConfig,
  code: string,
  fallback: Severity
): Severity {
  if (config.rules[code] === 'warn') return 'warning';
  return config.severity[code] ?? fallback;
}

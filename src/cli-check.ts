#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for aether-check.
 * Parses an Aether source file and reports syntax errors and lint findings.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CheckConfig, Diagnostic } from './check/index.js';
import {
  LINT_RULES,
  createDefaultConfig,
  extractContextLine,
  lintSource,
  loadConfig,
} from './check/index.js';
import { ParseError } from './error-classes.js';
import { errorCodeFromMessage } from './lsp/diagnostics.js';
import { parse } from './parser/index.js';

/**
 * Parsed command-line arguments for aether-check
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      file: string;
      verbose: boolean;
      format: 'text' | 'json';
    }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments for aether-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // --help and --version win in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const verbose = argv.includes('--verbose');

  let format: 'text' | 'json' = 'text';
  const formatIndex = argv.indexOf('--format');
  if (formatIndex !== -1) {
    const formatValue = argv[formatIndex + 1];
    if (formatValue === 'text' || formatValue === 'json') {
      format = formatValue;
    } else if (!formatValue || formatValue.startsWith('-')) {
      throw new Error('--format requires argument: text or json');
    } else {
      throw new Error(`Invalid format: ${formatValue}. Expected text or json`);
    }
  }

  const knownFlags = new Set([
    '--help',
    '-h',
    '--version',
    '-v',
    '--verbose',
    '--format',
  ]);

  let file: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg.startsWith('-')) {
      if (!knownFlags.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (arg === '--format') {
        i++; // the format value
      }
      continue;
    }

    // First non-flag argument is the file
    file ??= arg;
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, verbose, format };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostics for output
 *
 * Text format: file:line:col: severity: message (code)
 * JSON format: file, errors array and summary
 * Verbose mode: adds category field to JSON diagnostics
 */
export function formatDiagnostics(
  file: string,
  diagnostics: Diagnostic[],
  format: 'text' | 'json',
  verbose: boolean
): string {
  if (format === 'json') {
    return formatDiagnosticsJSON(file, diagnostics, verbose);
  }
  return formatDiagnosticsText(file, diagnostics);
}

/**
 * Multi-line messages are folded onto one line so every diagnostic is one
 * output line.
 */
function formatDiagnosticsText(
  file: string,
  diagnostics: Diagnostic[]
): string {
  return diagnostics
    .map((d) => {
      const { line, column } = d.location;
      const message = d.message.replace(/\n/g, '; ');
      return `${file}:${line}:${column}: ${d.severity}: ${message} (${d.code})`;
    })
    .join('\n');
}

function formatDiagnosticsJSON(
  file: string,
  diagnostics: Diagnostic[],
  verbose: boolean
): string {
  const categoryMap = new Map<string, string>();
  for (const rule of LINT_RULES) {
    categoryMap.set(rule.code, rule.category);
  }

  const errors = diagnostics.map((d) => {
    const error: Record<string, unknown> = {
      location: {
        line: d.location.line,
        column: d.location.column,
        offset: d.location.offset,
      },
      severity: d.severity,
      code: d.code,
      message: d.message,
      context: d.context,
    };

    if (verbose) {
      const category = categoryMap.get(d.code);
      if (category) {
        error['category'] = category;
      }
    }

    if (d.fix) {
      error['fix'] = {
        description: d.fix.description,
        applicable: d.fix.applicable,
        range: {
          start: {
            line: d.fix.range.start.line,
            column: d.fix.range.start.column,
            offset: d.fix.range.start.offset,
          },
          end: {
            line: d.fix.range.end.line,
            column: d.fix.range.end.column,
            offset: d.fix.range.end.offset,
          },
        },
        replacement: d.fix.replacement,
      };
    }

    return error;
  });

  const summary = {
    total: diagnostics.length,
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };

  return JSON.stringify({ file, errors, summary }, null, 2);
}

// ============================================================
// CHECK RUN
// ============================================================

/** Output sinks and working directory for one CLI run */
export interface CheckIO {
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const HELP_TEXT = `aether-check - Check Aether scripts

Usage: aether-check [options] <file>

Options:
  --format <fmt>  Output format: text (default) or json
  --verbose       Include rule categories in JSON output
  -h, --help      Show this help message
  -v, --version   Show version number

Configuration is read from .aether-check.yaml, .aether-check.yml or
.aether-check.json in the working directory.`;

/** Version from the package manifest next to src/ or dist/ */
export function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

/**
 * Convert the first syntax error to a diagnostic; null when the source parses.
 */
export function parseErrorDiagnostic(source: string): Diagnostic | null {
  try {
    parse(source);
    return null;
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    const { message } = err.toData();
    return {
      location: err.location,
      end: err.location,
      severity: 'error',
      code: err.errorId,
      editorCode: errorCodeFromMessage(message),
      message,
      context: extractContextLine(err.location.line, source),
      fix: null,
    };
  }
}

function emptyReport(file: string, format: 'text' | 'json'): string {
  if (format === 'text') return 'No issues found';
  return JSON.stringify(
    {
      file,
      errors: [],
      summary: { total: 0, errors: 0, warnings: 0, info: 0 },
    },
    null,
    2
  );
}

/**
 * Run aether-check and return the exit code.
 *
 * 0 no issues, 1 lint findings or unexpected failure, 2 unreadable input,
 * 3 syntax error.
 */
export function runCheck(argv: string[], io: CheckIO): number {
  try {
    const args = parseCheckArgs(argv);

    if (args.mode === 'help') {
      io.stdout(HELP_TEXT);
      return 0;
    }

    if (args.mode === 'version') {
      io.stdout(readVersion());
      return 0;
    }

    const config: CheckConfig = loadConfig(io.cwd) ?? createDefaultConfig();

    const path = resolve(io.cwd, args.file);
    if (!existsSync(path)) {
      io.stderr(`Error: File not found: ${args.file}`);
      return 2;
    }
    if (statSync(path).isDirectory()) {
      io.stderr(`Error: Path is a directory: ${args.file}`);
      return 2;
    }

    let source: string;
    try {
      source = readFileSync(path, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      io.stderr(`Error: Cannot read file: ${args.file} (${reason})`);
      return 2;
    }

    const parseError = parseErrorDiagnostic(source);
    if (parseError) {
      io.stdout(
        formatDiagnostics(args.file, [parseError], args.format, args.verbose)
      );
      return 3;
    }

    const diagnostics = lintSource(source, config);
    if (diagnostics.length === 0) {
      io.stdout(emptyReport(args.file, args.format));
      return 0;
    }

    io.stdout(
      formatDiagnostics(args.file, diagnostics, args.format, args.verbose)
    );
    return 1;
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  const code = runCheck(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
  process.exit(code);
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}

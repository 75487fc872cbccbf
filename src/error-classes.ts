/**
 * Aether Error Classes
 * Structured error types with registry-based error ids
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface AetherErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Aether errors.
 * Provides structured data for host applications to format as needed.
 */
export class AetherError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: AetherErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'AetherError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): AetherErrorData {
    return {
      errorId: this.errorId,
      // Strip location suffix
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: AetherErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// PARSE ERRORS
// ============================================================

export type ParseErrorKind =
  | 'unexpected-token'
  | 'unexpected-eof'
  | 'invalid-number'
  | 'invalid-expression'
  | 'invalid-statement'
  | 'invalid-identifier';

const PARSE_ERROR_IDS: Record<ParseErrorKind, string> = {
  'unexpected-token': 'AETHER-P001',
  'unexpected-eof': 'AETHER-P002',
  'invalid-number': 'AETHER-P003',
  'invalid-expression': 'AETHER-P004',
  'invalid-statement': 'AETHER-P005',
  'invalid-identifier': 'AETHER-P006',
};

/**
 * Parse-time errors. Always terminal for the parse that raised them.
 */
export class ParseError extends AetherError {
  readonly kind: ParseErrorKind;
  override readonly location: SourceLocation;

  constructor(
    kind: ParseErrorKind,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const errorId = PARSE_ERROR_IDS[kind];
    const definition = ERROR_REGISTRY.get(errorId);
    if (definition?.category !== 'parse') {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.kind = kind;
    this.location = location;
  }

  /** `Expected X, found Y` */
  static unexpectedToken(
    expected: string,
    found: string,
    location: SourceLocation
  ): ParseError {
    return new ParseError(
      'unexpected-token',
      `Expected ${expected}, found ${found}`,
      location,
      { expected, found }
    );
  }

  static unexpectedEof(
    expected: string | null,
    location: SourceLocation,
    hint?: string
  ): ParseError {
    let message = expected
      ? `Unexpected end of input: Expected ${expected}`
      : 'Unexpected end of input';
    if (hint) message += `. ${hint}`;
    return new ParseError('unexpected-eof', message, location, { expected });
  }

  static invalidNumber(text: string, location: SourceLocation): ParseError {
    return new ParseError(
      'invalid-number',
      `Invalid number: ${text}`,
      location,
      { text }
    );
  }

  static invalidExpression(
    reason: string,
    location: SourceLocation
  ): ParseError {
    return new ParseError(
      'invalid-expression',
      `Invalid expression - ${reason}`,
      location,
      { reason }
    );
  }

  static invalidStatement(
    reason: string,
    location: SourceLocation
  ): ParseError {
    return new ParseError(
      'invalid-statement',
      `Invalid statement - ${reason}`,
      location,
      { reason }
    );
  }

  static invalidIdentifier(
    name: string,
    reason: string,
    location: SourceLocation
  ): ParseError {
    return new ParseError(
      'invalid-identifier',
      `Invalid identifier '${name}' - ${reason}`,
      location,
      { name, reason }
    );
  }
}

// ============================================================
// CHECK ERRORS
// ============================================================

/** Invalid lint configuration */
export class CheckConfigError extends AetherError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super({
      errorId: 'AETHER-C001',
      message: `Invalid configuration: ${reason}`,
      context,
    });
    this.name = 'CheckConfigError';
  }
}

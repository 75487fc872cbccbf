/**
 * Aether Parser
 * Main entry point and re-exports
 */

import type { Program } from '../ast-nodes.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-declarations.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Aether source code into a program.
 *
 * Throws ParseError on the first syntax error; there is no recovery.
 *
 * @example
 * ```typescript
 * const program = parse('Set X 5 + 3 * 2');
 * ```
 */
export function parse(source: string): Program {
  return new Parser(source).parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export {
  createParserState,
  MAX_NESTING_DEPTH,
  type ParserState,
} from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

export {
  IDENTIFIER_REASONS,
  isBinderName,
  isDeclarationName,
  PRECEDENCE,
  type Precedence,
} from './helpers.js';

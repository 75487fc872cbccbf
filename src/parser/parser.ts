/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { Program } from '../ast-nodes.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts source text into an AST.
 *
 * Parsing is fail-fast: the first error throws a ParseError and no
 * partial program is returned.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program and statement dispatch, simple statements
 * - parser-declarations.ts: Set, Func, Generator, Lazy, Import, Export
 * - parser-control.ts: While, For, Switch, blocks, If expressions
 * - parser-expr.ts: Precedence climbing, prefix and infix forms
 * - parser-literals.ts: Arrays, dicts, lambdas, parameter lists
 *
 * @example
 * ```typescript
 * const parser = new Parser('Set TOTAL 5 + 3 * 2');
 * const program = parser.parse();
 * ```
 */
export class Parser {
  /** Lookahead buffer over the scanner */
  state: ParserState;

  constructor(source: string) {
    this.state = createParserState(source);
  }

  /**
   * Parse the whole source into a program.
   */
  parse(): Program {
    return this.parseProgram();
  }
}

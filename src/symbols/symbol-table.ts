/**
 * Symbol Table
 * Flat index of the variables and functions a program declares.
 */

import type { Program, StatementNode, ExpressionNode } from '../ast-nodes.js';
import type { SourceSpan } from '../source-location.js';
import {
  type LspLocation,
  type LspPosition,
  type LspRange,
  positionInRange,
  SYMBOL_KIND,
  type SymbolInformation,
  type SymbolKind,
  toLspPosition,
  type WorkspaceEdit,
} from '../lsp/types.js';
import { collectLeadingComment } from './documentation.js';

// ============================================================
// SYMBOL RECORDS
// ============================================================

export interface SymbolInfo {
  readonly name: string;
  readonly kind: SymbolKind;
  /** Whole declaration for functions, the name for variables */
  readonly range: LspRange;
  /** The declared name */
  readonly selectionRange: LspRange;
  /** Markdown shown on hover; may be empty */
  readonly documentation: string;
  /** One-line summary such as `Variable: TOTAL` */
  readonly detail: string | null;
}

export function spanToRange(span: SourceSpan): LspRange {
  return {
    start: toLspPosition(span.start.line, span.start.column),
    end: toLspPosition(span.end.line, span.end.column),
  };
}

// ============================================================
// SYMBOL TABLE
// ============================================================

export class SymbolTable {
  readonly variables: readonly SymbolInfo[];
  readonly functions: readonly SymbolInfo[];

  constructor(
    variables: readonly SymbolInfo[] = [],
    functions: readonly SymbolInfo[] = []
  ) {
    this.variables = Object.freeze([...variables]);
    this.functions = Object.freeze([...functions]);
  }

  /**
   * Extract symbols from a parsed program, including definitions nested
   * in function, loop, switch, conditional and lambda bodies.
   * `text` is the program's source, used for leading comments.
   */
  static fromProgram(program: Readonly<Program>, text: string): SymbolTable {
    const collector = new SymbolCollector(text);
    collector.statements(program);
    return new SymbolTable(collector.variables, collector.functions);
  }

  /** Symbol whose range contains the position; variables win over functions */
  findAtPosition(position: LspPosition): SymbolInfo | null {
    for (const variable of this.variables) {
      if (positionInRange(position, variable.range)) return variable;
    }
    for (const fn of this.functions) {
      if (positionInRange(position, fn.range)) return fn;
    }
    return null;
  }

  findDefinition(position: LspPosition, uri: string): LspLocation | null {
    const symbol = this.findAtPosition(position);
    return symbol ? { uri, range: symbol.range } : null;
  }

  /** Outline: variables first, then functions, each in declaration order */
  toDocumentSymbols(uri: string): SymbolInformation[] {
    return [...this.variables, ...this.functions].map((symbol) => ({
      name: symbol.name,
      kind: symbol.kind,
      location: { uri, range: symbol.range },
    }));
  }

  /**
   * Rename is not supported yet; no edit is ever produced.
   */
  renameSymbol(
    _position: LspPosition,
    _newName: string,
    _uri: string
  ): WorkspaceEdit | null {
    return null;
  }
}

// ============================================================
// COLLECTION
// ============================================================

class SymbolCollector {
  readonly variables: SymbolInfo[] = [];
  readonly functions: SymbolInfo[] = [];
  private readonly lines: readonly string[];

  constructor(text: string) {
    this.lines = text.split('\n');
  }

  statements(statements: readonly StatementNode[]): void {
    for (const statement of statements) {
      this.statement(statement);
    }
  }

  private statement(node: StatementNode): void {
    switch (node.type) {
      case 'Set':
        this.addVariable(node.name, node.nameSpan, `Variable: ${node.name}`);
        break;

      case 'LazyDef':
        this.addVariable(node.name, node.nameSpan, `Lazy: ${node.name}`);
        break;

      case 'FuncDef':
      case 'GeneratorDef': {
        const label = node.type === 'FuncDef' ? 'Function' : 'Generator';
        const signature = `${node.name}(${node.params.join(', ')})`;
        const comment = this.comment(node.nameSpan);
        this.functions.push({
          name: node.name,
          kind: SYMBOL_KIND.FUNCTION,
          range: spanToRange(node.span),
          selectionRange: spanToRange(node.nameSpan),
          documentation:
            `${label}: ${signature}` + (comment ? `\n\n${comment}` : ''),
          detail: `${label}: ${signature} { ... }`,
        });
        this.statements(node.body);
        break;
      }

      case 'While':
      case 'For':
      case 'ForIndexed':
        this.statements(node.body);
        break;

      case 'Switch':
        for (const switchCase of node.cases) {
          this.statements(switchCase.body);
        }
        if (node.defaultBody) {
          this.statements(node.defaultBody);
        }
        break;

      case 'ExpressionStatement':
        this.expression(node.expression);
        break;

      default:
        break;
    }
  }

  /** Lambdas and conditionals used as statements */
  private expression(node: ExpressionNode): void {
    switch (node.type) {
      case 'Lambda':
        this.statements(node.body);
        break;

      case 'If':
        this.statements(node.thenBranch);
        for (const branch of node.elifBranches) {
          this.statements(branch.body);
        }
        if (node.elseBranch) {
          this.statements(node.elseBranch);
        }
        break;

      default:
        break;
    }
  }

  private addVariable(
    name: string,
    nameSpan: SourceSpan,
    detail: string
  ): void {
    const range = spanToRange(nameSpan);
    this.variables.push({
      name,
      kind: SYMBOL_KIND.VARIABLE,
      range,
      selectionRange: range,
      documentation: this.comment(nameSpan),
      detail,
    });
  }

  private comment(nameSpan: SourceSpan): string {
    return collectLeadingComment(this.lines, nameSpan.start.line - 1);
  }
}

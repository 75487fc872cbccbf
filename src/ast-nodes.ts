import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM
// ============================================================

/** Statements in execution order */
export type Program = StatementNode[];

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | SetNode
  | SetIndexNode
  | FuncDefNode
  | GeneratorDefNode
  | LazyDefNode
  | ReturnNode
  | YieldNode
  | BreakNode
  | ContinueNode
  | WhileNode
  | ForNode
  | ForIndexedNode
  | SwitchNode
  | ImportNode
  | ExportNode
  | ThrowNode
  | ExpressionStatementNode;

/** Set NAME value */
export interface SetNode extends BaseNode {
  readonly type: 'Set';
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly value: ExpressionNode;
}

/** Set NAME[index] value (no whitespace before `[`) */
export interface SetIndexNode extends BaseNode {
  readonly type: 'SetIndex';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
  readonly value: ExpressionNode;
}

/** Func NAME(params) { body } */
export interface FuncDefNode extends BaseNode {
  readonly type: 'FuncDef';
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly params: string[];
  readonly body: StatementNode[];
}

/** Generator NAME(params) { body }; same shape as FuncDef */
export interface GeneratorDefNode extends BaseNode {
  readonly type: 'GeneratorDef';
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly params: string[];
  readonly body: StatementNode[];
}

/** Lazy NAME(expr) */
export interface LazyDefNode extends BaseNode {
  readonly type: 'LazyDef';
  readonly name: string;
  readonly nameSpan: SourceSpan;
  readonly expression: ExpressionNode;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode;
}

export interface YieldNode extends BaseNode {
  readonly type: 'Yield';
  readonly value: ExpressionNode;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

/** While (condition) { body } */
export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

/** For VAR In iterable { body } */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly variable: string;
  readonly iterable: ExpressionNode;
  readonly body: StatementNode[];
}

/** For INDEX, VALUE In iterable { body } */
export interface ForIndexedNode extends BaseNode {
  readonly type: 'ForIndexed';
  readonly indexVar: string;
  readonly valueVar: string;
  readonly iterable: ExpressionNode;
  readonly body: StatementNode[];
}

export interface SwitchCase {
  readonly test: ExpressionNode;
  readonly body: StatementNode[];
}

/** Switch (expr) { Case value: ... Default: ... } */
export interface SwitchNode extends BaseNode {
  readonly type: 'Switch';
  readonly discriminant: ExpressionNode;
  readonly cases: SwitchCase[];
  readonly defaultBody: StatementNode[] | null;
}

/**
 * Import NAME [As ALIAS] From "path"
 * Import { NAME [As ALIAS], ... } From "path"
 *
 * `aliases[i]` belongs to `names[i]`.
 */
export interface ImportNode extends BaseNode {
  readonly type: 'Import';
  readonly names: string[];
  readonly aliases: (string | null)[];
  readonly path: string;
}

export interface ExportNode extends BaseNode {
  readonly type: 'Export';
  readonly name: string;
}

export interface ThrowNode extends BaseNode {
  readonly type: 'Throw';
  readonly value: ExpressionNode;
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | NumberLiteralNode
  | BigIntegerLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NullLiteralNode
  | IdentifierNode
  | ArrayLiteralNode
  | DictLiteralNode
  | BinaryExprNode
  | UnaryExprNode
  | CallNode
  | IndexNode
  | IfExprNode
  | LambdaNode;

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

/** Integer literal of more than 15 digits, kept as its exact digit string */
export interface BigIntegerLiteralNode extends BaseNode {
  readonly type: 'BigIntegerLiteral';
  readonly digits: string;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NullLiteralNode extends BaseNode {
  readonly type: 'NullLiteral';
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface ArrayLiteralNode extends BaseNode {
  readonly type: 'ArrayLiteral';
  readonly elements: ExpressionNode[];
}

/** Entries keep source order; duplicate keys are kept as written */
export interface DictEntry {
  readonly key: string;
  readonly value: ExpressionNode;
}

export interface DictLiteralNode extends BaseNode {
  readonly type: 'DictLiteral';
  readonly entries: DictEntry[];
}

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '&&'
  | '||';

export type UnaryOp = '-' | '!';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface ElifBranch {
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

/** If (cond) { } Elif (cond) { } ... Else { }; conditionals are values */
export interface IfExprNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode[];
  readonly elifBranches: ElifBranch[];
  readonly elseBranch: StatementNode[] | null;
}

/**
 * Func(params) { body } or Lambda X -> expr / Lambda (X, Y) -> expr.
 * The arrow form's body is a single Return of its expression.
 */
export interface LambdaNode extends BaseNode {
  readonly type: 'Lambda';
  readonly params: string[];
  readonly body: StatementNode[];
}

// ============================================================
// NODE UNION
// ============================================================

export type ASTNode = StatementNode | ExpressionNode;

export type NodeType = ASTNode['type'];

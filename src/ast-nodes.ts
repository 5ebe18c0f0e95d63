import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

// ============================================================
// OPERATORS
// ============================================================

export type LogicalOp = 'and' | 'or';
export type EqualityOp = '==' | '!=';
export type ComparisonOp = '<' | '>' | '<=' | '>=';
export type AdditiveOp = '+' | '-';
export type MultiplicativeOp = '*' | '/';

export type BinaryOp =
  | LogicalOp
  | EqualityOp
  | ComparisonOp
  | AdditiveOp
  | MultiplicativeOp;

/**
 * Prefix operators. `-` is the same tagged value as subtraction;
 * the grammar position decides which one was written.
 */
export type UnaryOp = 'not' | '-';

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Variable declaration: var name = expr;
 * Without an initializer the parser supplies a NilLiteral.
 */
export interface DeclarationNode extends BaseNode {
  readonly type: 'Declaration';
  readonly name: string;
  readonly initializer: ExpressionNode;
}

/**
 * Assignment: target = value;
 * The target is any expression. Restricting it to assignable forms is
 * left to a later pass.
 */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly target: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/**
 * Conditional: if cond { ... } else <statement>
 * elseBranch is never absent. No else clause yields an empty Block;
 * `else if` yields a nested IfNode.
 */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: BlockNode;
  readonly elseBranch: StatementNode;
}

/** for init; test; increment; { ... } with every clause optional */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly init: ExpressionNode | null;
  readonly test: ExpressionNode | null;
  readonly increment: ExpressionNode | null;
  readonly body: BlockNode;
}

export interface FunDeclNode extends BaseNode {
  readonly type: 'FunDecl';
  readonly name: string;
  /** Parameter names in declaration order. Duplicates are kept. */
  readonly params: string[];
  readonly body: BlockNode;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

/** A call used as a statement for its side effects: f(x); */
export interface ImpureCallNode extends BaseNode {
  readonly type: 'ImpureCall';
  readonly call: FunCallNode;
}

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

export type StatementNode =
  | DeclarationNode
  | AssignmentNode
  | WhileNode
  | IfNode
  | ForNode
  | FunDeclNode
  | ReturnNode
  | BreakNode
  | ContinueNode
  | ImpureCallNode
  | BlockNode;

// ============================================================
// LITERALS
// ============================================================

/** 32-bit signed integer parsed from a run of decimal digits */
export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

/** String literal. The value keeps its surrounding double quotes. */
export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export type LiteralNode =
  | NumberLiteralNode
  | BoolLiteralNode
  | StringLiteralNode
  | NilLiteralNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

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

export interface FunCallNode extends BaseNode {
  readonly type: 'FunCall';
  readonly name: string;
  readonly args: ExpressionNode[];
}

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | BinaryExprNode
  | UnaryExprNode
  | FunCallNode;

// ============================================================
// UNION OF ALL NODES
// ============================================================

export type ASTNode = ProgramNode | StatementNode | ExpressionNode;

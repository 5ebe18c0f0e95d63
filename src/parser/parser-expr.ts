/**
 * Parser Extension: Expression Parsing
 * Precedence chain from logical operators down to unary prefixes
 *
 * Layers, lowest precedence first:
 *   logical        and or          left
 *   equality       == !=           left
 *   comparison     < > <= >=       left
 *   additive       + -             left
 *   multiplicative * /             left
 *   unary          not -           prefix, stacks
 *   primary        see parser-literals.ts
 */

import { Parser } from './parser.js';
import type {
  AdditiveOp,
  BinaryOp,
  ComparisonOp,
  EqualityOp,
  ExpressionNode,
  LogicalOp,
  MultiplicativeOp,
  TokenType,
  UnaryOp,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, current, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseLogical(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseBinaryLayer<Op extends BinaryOp>(
      operators: Readonly<Partial<Record<TokenType, Op>>>,
      parseOperand: () => ExpressionNode
    ): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const LOGICAL_OPS: Readonly<Partial<Record<TokenType, LogicalOp>>> = {
  [TOKEN_TYPES.AND]: 'and',
  [TOKEN_TYPES.OR]: 'or',
};

const EQUALITY_OPS: Readonly<Partial<Record<TokenType, EqualityOp>>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
};

const COMPARISON_OPS: Readonly<Partial<Record<TokenType, ComparisonOp>>> = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GE]: '>=',
};

const ADDITIVE_OPS: Readonly<Partial<Record<TokenType, AdditiveOp>>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const MULTIPLICATIVE_OPS: Readonly<
  Partial<Record<TokenType, MultiplicativeOp>>
> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
};

/** Prefix operators. MINUS maps to the same '-' as subtraction. */
const UNARY_OPS: Readonly<Partial<Record<TokenType, UnaryOp>>> = {
  [TOKEN_TYPES.NOT]: 'not',
  [TOKEN_TYPES.MINUS]: '-',
};

// ============================================================
// ENTRY
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseLogical();
};

// ============================================================
// BINARY LAYERS
// ============================================================

/**
 * Layer := Operand (Op Operand)*
 * Folds left, so the leftmost operation ends up deepest:
 * a - b - c becomes ((a - b) - c).
 */
Parser.prototype.parseBinaryLayer = function <Op extends BinaryOp>(
  this: Parser,
  operators: Readonly<Partial<Record<TokenType, Op>>>,
  parseOperand: () => ExpressionNode
): ExpressionNode {
  let left = parseOperand();

  let op = operators[current(this.state).type];
  while (op !== undefined) {
    advance(this.state);
    const right = parseOperand();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
    op = operators[current(this.state).type];
  }

  return left;
};

Parser.prototype.parseLogical = function (this: Parser): ExpressionNode {
  return this.parseBinaryLayer(LOGICAL_OPS, () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLayer(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLayer(COMPARISON_OPS, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return this.parseBinaryLayer(ADDITIVE_OPS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return this.parseBinaryLayer(MULTIPLICATIVE_OPS, () => this.parseUnary());
};

// ============================================================
// UNARY
// ============================================================

/** Unary := ('not' | '-') Unary | Primary */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const op = UNARY_OPS[token.type];
  if (op === undefined) {
    return this.parsePrimary();
  }

  advance(this.state);
  const operand = this.parseUnary();

  return {
    type: 'UnaryExpr',
    op,
    operand,
    span: makeSpan(token.span.start, operand.span.end),
  };
};

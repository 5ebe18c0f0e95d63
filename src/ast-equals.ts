/**
 * AST Structural Equality
 *
 * Compares AST nodes for structural equality, ignoring source locations.
 * Used as the oracle for printer round-trips.
 */

import type {
  ASTNode,
  BlockNode,
  ExpressionNode,
  StatementNode,
} from './types.js';

/**
 * Helper to compare two nullable values for structural equality.
 * Returns false if nullability differs, otherwise compares with astEquals.
 */
function nullableEquals<T extends ASTNode>(a: T | null, b: T | null): boolean {
  if (a === null || b === null) return a === b;
  return astEquals(a, b);
}

function listEquals<T extends ASTNode>(
  a: readonly T[],
  b: readonly T[]
): boolean {
  if (a.length !== b.length) return false;
  return a.every((node, i) => {
    const other = b[i];
    return other !== undefined && astEquals(node, other);
  });
}

function blockEquals(a: BlockNode, b: BlockNode): boolean {
  return listEquals(a.statements, b.statements);
}

function expressionEquals(a: ExpressionNode, b: ExpressionNode): boolean {
  switch (a.type) {
    case 'NumberLiteral':
      return b.type === 'NumberLiteral' && a.value === b.value;
    case 'BoolLiteral':
      return b.type === 'BoolLiteral' && a.value === b.value;
    case 'StringLiteral':
      return b.type === 'StringLiteral' && a.value === b.value;
    case 'NilLiteral':
      return b.type === 'NilLiteral';
    case 'Identifier':
      return b.type === 'Identifier' && a.name === b.name;
    case 'BinaryExpr':
      return (
        b.type === 'BinaryExpr' &&
        a.op === b.op &&
        expressionEquals(a.left, b.left) &&
        expressionEquals(a.right, b.right)
      );
    case 'UnaryExpr':
      return (
        b.type === 'UnaryExpr' &&
        a.op === b.op &&
        expressionEquals(a.operand, b.operand)
      );
    case 'FunCall':
      return (
        b.type === 'FunCall' && a.name === b.name && listEquals(a.args, b.args)
      );
  }
}

function statementEquals(a: StatementNode, b: StatementNode): boolean {
  switch (a.type) {
    case 'Declaration':
      return (
        b.type === 'Declaration' &&
        a.name === b.name &&
        expressionEquals(a.initializer, b.initializer)
      );
    case 'Assignment':
      return (
        b.type === 'Assignment' &&
        expressionEquals(a.target, b.target) &&
        expressionEquals(a.value, b.value)
      );
    case 'While':
      return (
        b.type === 'While' &&
        expressionEquals(a.condition, b.condition) &&
        blockEquals(a.body, b.body)
      );
    case 'If':
      return (
        b.type === 'If' &&
        expressionEquals(a.condition, b.condition) &&
        blockEquals(a.thenBranch, b.thenBranch) &&
        statementEquals(a.elseBranch, b.elseBranch)
      );
    case 'For':
      return (
        b.type === 'For' &&
        nullableEquals(a.init, b.init) &&
        nullableEquals(a.test, b.test) &&
        nullableEquals(a.increment, b.increment) &&
        blockEquals(a.body, b.body)
      );
    case 'FunDecl':
      return (
        b.type === 'FunDecl' &&
        a.name === b.name &&
        a.params.length === b.params.length &&
        a.params.every((param, i) => param === b.params[i]) &&
        blockEquals(a.body, b.body)
      );
    case 'Return':
      return b.type === 'Return' && nullableEquals(a.value, b.value);
    case 'Break':
    case 'Continue':
      return b.type === a.type;
    case 'ImpureCall':
      return b.type === 'ImpureCall' && expressionEquals(a.call, b.call);
    case 'Block':
      return b.type === 'Block' && blockEquals(a, b);
  }
}

function isExpression(node: ASTNode): node is ExpressionNode {
  switch (node.type) {
    case 'NumberLiteral':
    case 'BoolLiteral':
    case 'StringLiteral':
    case 'NilLiteral':
    case 'Identifier':
    case 'BinaryExpr':
    case 'UnaryExpr':
    case 'FunCall':
      return true;
    default:
      return false;
  }
}

/**
 * Compare two AST nodes for structural equality.
 * Ignores source locations (span) - only compares structure and values.
 */
export function astEquals(a: ASTNode, b: ASTNode): boolean {
  if (a.type !== b.type) return false;

  if (a.type === 'Program') {
    return b.type === 'Program' && listEquals(a.statements, b.statements);
  }
  if (b.type === 'Program') return false;

  if (isExpression(a)) {
    return isExpression(b) && expressionEquals(a, b);
  }
  if (isExpression(b)) return false;

  return statementEquals(a, b);
}

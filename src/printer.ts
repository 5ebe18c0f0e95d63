/**
 * Printer
 *
 * Serializes an AST back to canonical source text. Binary expressions are
 * fully parenthesized, so re-parsing the output rebuilds the same tree.
 */

import type {
  BlockNode,
  ExpressionNode,
  ForNode,
  IfNode,
  ProgramNode,
  StatementNode,
} from './types.js';

export interface FormatOptions {
  /** Indentation unit for nested blocks (default: two spaces) */
  indent?: string | undefined;
  /** Write the `;` between a for-loop's increment and body (default: false) */
  forLoopSemicolon?: boolean | undefined;
}

interface Printer {
  readonly indent: string;
  readonly forLoopSemicolon: boolean;
}

function createPrinter(options: FormatOptions = {}): Printer {
  return {
    indent: options.indent ?? '  ',
    forLoopSemicolon: options.forLoopSemicolon ?? false,
  };
}

// ============================================================
// EXPRESSIONS
// ============================================================

export function formatExpression(node: ExpressionNode): string {
  switch (node.type) {
    case 'NumberLiteral':
      return String(node.value);
    case 'BoolLiteral':
      return node.value ? 'True' : 'False';
    case 'StringLiteral':
      return node.value;
    case 'NilLiteral':
      return 'Nil';
    case 'Identifier':
      return node.name;
    case 'BinaryExpr':
      return `(${formatExpression(node.left)} ${node.op} ${formatExpression(node.right)})`;
    case 'UnaryExpr':
      return `${node.op} ${formatExpression(node.operand)}`;
    case 'FunCall':
      return `${node.name}(${node.args.map(formatExpression).join(', ')})`;
  }
}

// ============================================================
// STATEMENTS
// ============================================================

function formatBlock(
  printer: Printer,
  block: BlockNode,
  depth: number
): string {
  if (block.statements.length === 0) return '{}';
  const lines = block.statements.map(
    (statement) =>
      printer.indent.repeat(depth + 1) +
      printStatement(printer, statement, depth + 1)
  );
  return `{\n${lines.join('\n')}\n${printer.indent.repeat(depth)}}`;
}

function formatIf(printer: Printer, node: IfNode, depth: number): string {
  const head = `if ${formatExpression(node.condition)} ${formatBlock(printer, node.thenBranch, depth)}`;
  const elseBranch = node.elseBranch;

  if (elseBranch.type === 'Block') {
    if (elseBranch.statements.length === 0) return head;
    return `${head} else ${formatBlock(printer, elseBranch, depth)}`;
  }
  return `${head} else ${printStatement(printer, elseBranch, depth)}`;
}

function formatFor(printer: Printer, node: ForNode, depth: number): string {
  const clause = (expr: ExpressionNode | null): string =>
    expr ? formatExpression(expr) : '';
  const clauses =
    `for ${clause(node.init)}; ${clause(node.test)}; ${clause(node.increment)}`.trimEnd();
  const separator = printer.forLoopSemicolon ? ';' : '';
  return `${clauses}${separator} ${formatBlock(printer, node.body, depth)}`;
}

function printStatement(
  printer: Printer,
  node: StatementNode,
  depth: number
): string {
  switch (node.type) {
    case 'Declaration':
      return node.initializer.type === 'NilLiteral'
        ? `var ${node.name};`
        : `var ${node.name} = ${formatExpression(node.initializer)};`;
    case 'Assignment':
      return `${formatExpression(node.target)} = ${formatExpression(node.value)};`;
    case 'While':
      return `while ${formatExpression(node.condition)} ${formatBlock(printer, node.body, depth)}`;
    case 'If':
      return formatIf(printer, node, depth);
    case 'For':
      return formatFor(printer, node, depth);
    case 'FunDecl':
      return `fun ${node.name}(${node.params.join(', ')}) ${formatBlock(printer, node.body, depth)}`;
    case 'Return':
      return node.value ? `return ${formatExpression(node.value)};` : 'return;';
    case 'Break':
      return 'break;';
    case 'Continue':
      return 'continue;';
    case 'ImpureCall':
      return `${formatExpression(node.call)};`;
    case 'Block':
      return formatBlock(printer, node, depth);
  }
}

/**
 * Format one statement. Nested blocks are indented relative to column 0.
 */
export function formatStatement(
  node: StatementNode,
  options?: FormatOptions
): string {
  return printStatement(createPrinter(options), node, 0);
}

/**
 * Format a whole program, one top-level statement per line, ending with a
 * newline. An empty program formats to an empty string.
 */
export function formatProgram(
  program: ProgramNode,
  options?: FormatOptions
): string {
  const printer = createPrinter(options);
  return program.statements
    .map((statement) => `${printStatement(printer, statement, 0)}\n`)
    .join('');
}

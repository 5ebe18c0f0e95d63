/**
 * Parser Extension: Program and Statement Parsing
 * Program, statement dispatch, declarations, assignments and jumps
 */

import { Parser } from './parser.js';
import type {
  AssignmentNode,
  BreakNode,
  ContinueNode,
  DeclarationNode,
  ExpressionNode,
  ImpureCallNode,
  ProgramNode,
  ReturnNode,
  StatementNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  previousEnd,
  typoHint,
  withHint,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatements(): StatementNode[];
    parseStatement(): StatementNode;
    parseDeclaration(): DeclarationNode;
    parseExpressionStatement(): AssignmentNode | ImpureCallNode;
    parseReturn(): ReturnNode;
    parseBreak(): BreakNode;
    parseContinue(): ContinueNode;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const { onStatement } = this.state.options.callbacks;

  const statements: StatementNode[] = [];
  while (!isAtEnd(this.state)) {
    const statement = this.parseStatement();
    onStatement?.({ index: statements.length, statement });
    statements.push(statement);
  }

  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Zero or more statements, stopping before `}` or end of input.
 * The caller consumes the closing brace.
 */
Parser.prototype.parseStatements = function (this: Parser): StatementNode[] {
  const statements: StatementNode[] = [];
  while (!isAtEnd(this.state) && !check(this.state, TOKEN_TYPES.RBRACE)) {
    statements.push(this.parseStatement());
  }
  return statements;
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.VAR:
      return this.parseDeclaration();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.FUN:
      return this.parseFunDecl();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.BREAK:
      return this.parseBreak();
    case TOKEN_TYPES.CONTINUE:
      return this.parseContinue();
  }

  if (!this.canStartExpression()) {
    throw ParseError.at('ESTA-P001', current(this.state));
  }
  return this.parseExpressionStatement();
};

// ============================================================
// SIMPLE STATEMENTS
// ============================================================

Parser.prototype.parseDeclaration = function (
  this: Parser
): DeclarationNode {
  const start = expect(this.state, TOKEN_TYPES.VAR, "'var'").span.start;
  const nameToken = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier');

  let initializer: DeclarationNode['initializer'];
  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    advance(this.state);
    initializer = this.parseExpression();
  } else {
    initializer = { type: 'NilLiteral', span: nameToken.span };
  }

  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");

  return {
    type: 'Declaration',
    name: nameToken.value,
    initializer,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/**
 * Assignment or call statement. The span starts at the first token, so a
 * leading `(` is included. The leading expression is parsed once;
 * a following `=` makes it an assignment target, otherwise it must be
 * a call terminated by `;`.
 */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): AssignmentNode | ImpureCallNode {
  const startToken = current(this.state);
  const expression = this.parseExpression();

  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    advance(this.state);
    const value = this.parseExpression();
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    return {
      type: 'Assignment',
      target: expression,
      value,
      span: makeSpan(startToken.span.start, previousEnd(this.state)),
    };
  }

  if (expression.type !== 'FunCall') {
    throw withHint(
      ParseError.at('ESTA-P004', startToken, {
        node: describeExpression(expression.type),
      }),
      expression.type === 'Identifier' ? typoHint(startToken) : null
    );
  }

  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
  return {
    type: 'ImpureCall',
    call: expression,
    span: makeSpan(startToken.span.start, previousEnd(this.state)),
  };
};

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = expect(this.state, TOKEN_TYPES.RETURN, "'return'").span.start;
  const value = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? null
    : this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");

  return {
    type: 'Return',
    value,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseBreak = function (this: Parser): BreakNode {
  const start = expect(this.state, TOKEN_TYPES.BREAK, "'break'").span.start;
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
  return { type: 'Break', span: makeSpan(start, previousEnd(this.state)) };
};

Parser.prototype.parseContinue = function (this: Parser): ContinueNode {
  const start = expect(this.state, TOKEN_TYPES.CONTINUE, "'continue'").span
    .start;
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
  return { type: 'Continue', span: makeSpan(start, previousEnd(this.state)) };
};

type NonCallType = Exclude<ExpressionNode['type'], 'FunCall'>;

const EXPRESSION_DESCRIPTIONS: Record<NonCallType, string> = {
  NumberLiteral: 'number literal',
  BoolLiteral: 'boolean literal',
  StringLiteral: 'string literal',
  NilLiteral: 'Nil',
  Identifier: 'identifier',
  BinaryExpr: 'binary expression',
  UnaryExpr: 'unary expression',
};

function describeExpression(type: NonCallType): string {
  return EXPRESSION_DESCRIPTIONS[type];
}

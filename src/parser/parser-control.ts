/**
 * Parser Extension: Control Flow Parsing
 * Blocks, while loops, conditionals and for loops
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ExpressionNode,
  ForNode,
  IfNode,
  StatementNode,
  TokenType,
  WhileNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  previousEnd,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockNode;
    parseWhile(): WhileNode;
    parseIf(): IfNode;
    parseElseBranch(): StatementNode;
    parseFor(): ForNode;
    parseForClause(...terminators: TokenType[]): ExpressionNode | null;
  }
}

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE, "'{'").span.start;
  const statements = this.parseStatements();
  expect(this.state, TOKEN_TYPES.RBRACE, "'}'");

  return {
    type: 'Block',
    statements,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = expect(this.state, TOKEN_TYPES.WHILE, "'while'").span.start;
  const condition = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'While',
    condition,
    body,
    span: makeSpan(start, body.span.end),
  };
};

/**
 * for init? ; test? ; increment? [;] { body }
 * The separator before the body follows the forLoopSemicolon option.
 */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = expect(this.state, TOKEN_TYPES.FOR, "'for'").span.start;

  const init = this.parseForClause(TOKEN_TYPES.SEMICOLON);
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
  const test = this.parseForClause(TOKEN_TYPES.SEMICOLON);
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
  const increment = this.parseForClause(
    TOKEN_TYPES.SEMICOLON,
    TOKEN_TYPES.LBRACE
  );

  switch (this.state.options.forLoopSemicolon) {
    case 'required':
      expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
      break;
    case 'forbidden':
      if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
        throw ParseError.at('ESTA-P005', current(this.state));
      }
      break;
    case 'optional':
      if (check(this.state, TOKEN_TYPES.SEMICOLON)) advance(this.state);
      break;
  }

  const body = this.parseBlock();

  return {
    type: 'For',
    init,
    test,
    increment,
    body,
    span: makeSpan(start, body.span.end),
  };
};

/** An optional clause: empty when the next token already ends it */
Parser.prototype.parseForClause = function (
  this: Parser,
  ...terminators: TokenType[]
): ExpressionNode | null {
  if (check(this.state, ...terminators)) return null;
  return this.parseExpression();
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = expect(this.state, TOKEN_TYPES.IF, "'if'").span.start;
  const condition = this.parseExpression();
  const thenBranch = this.parseBlock();

  let elseBranch: StatementNode;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    elseBranch = this.parseElseBranch();
  } else {
    // No else clause: an empty block positioned after the then branch
    const end = thenBranch.span.end;
    elseBranch = { type: 'Block', statements: [], span: makeSpan(end, end) };
  }

  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/**
 * The else clause takes any statement, so `else if` chains by recursion.
 * A brace body is read as a Block.
 */
Parser.prototype.parseElseBranch = function (this: Parser): StatementNode {
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    return this.parseBlock();
  }
  return this.parseStatement();
};

/**
 * Parser Extension: Primary Expressions
 * Literals, identifiers, calls and parenthesized expressions
 */

import { Parser } from './parser.js';
import type { ExpressionNode, NumberLiteralNode } from '../types.js';
import { LiteralError, ParseError, TOKEN_TYPES } from '../types.js';
import { advance, check, current, expect, peek } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseNumberLiteral(): NumberLiteralNode;
    parseGrouped(): ExpressionNode;
    canStartExpression(): boolean;
    isCallStart(): boolean;
  }
}

const INT32_MAX = 2147483647;

const EXPRESSION_START = [
  TOKEN_TYPES.NUMBER,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
  TOKEN_TYPES.NIL,
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.LPAREN,
  TOKEN_TYPES.NOT,
  TOKEN_TYPES.MINUS,
] as const;

// ============================================================
// LOOKAHEAD
// ============================================================

Parser.prototype.canStartExpression = function (this: Parser): boolean {
  return check(this.state, ...EXPRESSION_START);
};

/** identifier immediately followed by ( */
Parser.prototype.isCallStart = function (this: Parser): boolean {
  return (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.LPAREN
  );
};

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      return this.parseNumberLiteral();

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };

    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'NilLiteral', span: token.span };

    case TOKEN_TYPES.IDENTIFIER:
      if (this.isCallStart()) {
        return this.parseFunCall();
      }
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };

    case TOKEN_TYPES.LPAREN:
      return this.parseGrouped();
  }

  throw ParseError.at('ESTA-P003', token);
};

/**
 * Decimal digits to a 32-bit signed integer.
 * @throws LiteralError when the value exceeds 2147483647
 */
Parser.prototype.parseNumberLiteral = function (
  this: Parser
): NumberLiteralNode {
  const token = expect(this.state, TOKEN_TYPES.NUMBER, 'number');
  const value = Number(token.value);

  if (!Number.isSafeInteger(value) || value > INT32_MAX) {
    throw new LiteralError(token.value, token.span.start);
  }

  return { type: 'NumberLiteral', value, span: token.span };
};

/** ( expr ). The parentheses leave no node behind. */
Parser.prototype.parseGrouped = function (this: Parser): ExpressionNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return expression;
};

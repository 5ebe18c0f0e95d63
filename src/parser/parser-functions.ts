/**
 * Parser Extension: Function Parsing
 * Function declarations, calls and the shared comma-list combinator
 */

import { Parser } from './parser.js';
import type { FunCallNode, FunDeclNode, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, check, expect, makeSpan, previousEnd } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunDecl(): FunDeclNode;
    parseFunCall(): FunCallNode;
    parseCommaList<T>(
      parseItem: () => T,
      closing: TokenType,
      closingText: string
    ): T[];
  }
}

// ============================================================
// COMMA LIST
// ============================================================

/**
 * Zero or more items separated by `,` with an optional trailing comma,
 * followed by the closing token, which is consumed.
 * Accepts `()`, `(a)`, `(a, b)` and `(a, b,)`.
 */
Parser.prototype.parseCommaList = function <T>(
  this: Parser,
  parseItem: () => T,
  closing: TokenType,
  closingText: string
): T[] {
  const items: T[] = [];

  while (!check(this.state, closing)) {
    items.push(parseItem());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state); // consume ,
  }

  expect(this.state, closing, closingText);
  return items;
};

// ============================================================
// DECLARATIONS
// ============================================================

/** fun name(a, b) { body }. Duplicate parameter names are kept as written. */
Parser.prototype.parseFunDecl = function (this: Parser): FunDeclNode {
  const start = expect(this.state, TOKEN_TYPES.FUN, "'fun'").span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'function name');
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");

  const params = this.parseCommaList(
    () => expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name').value,
    TOKEN_TYPES.RPAREN,
    "')'"
  );

  const body = this.parseBlock();

  return {
    type: 'FunDecl',
    name: name.value,
    params,
    body,
    span: makeSpan(start, body.span.end),
  };
};

// ============================================================
// CALLS
// ============================================================

/** name(args). The caller has checked for `identifier (`. */
Parser.prototype.parseFunCall = function (this: Parser): FunCallNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'function name');
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");

  const args = this.parseCommaList(
    () => this.parseExpression(),
    TOKEN_TYPES.RPAREN,
    "')'"
  );

  return {
    type: 'FunCall',
    name: name.value,
    args,
    span: makeSpan(name.span.start, previousEnd(this.state)),
  };
};

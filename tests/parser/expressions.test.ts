/**
 * Esta Parser Tests: Expressions
 * Precedence, associativity, unary stacking, calls and literals
 */

import { describe, expect, it } from 'vitest';

import {
  EstaError,
  LiteralError,
  parseExpression,
} from '../../src/index.js';

function num(value: number) {
  return { type: 'NumberLiteral', value };
}

function id(name: string) {
  return { type: 'Identifier', name };
}

function failure(source: string): EstaError {
  try {
    parseExpression(source);
  } catch (err) {
    if (err instanceof EstaError) return err;
    throw err;
  }
  throw new Error(`Expected parseExpression to fail: ${source}`);
}

describe('Esta Parser: Expressions', () => {
  describe('Precedence', () => {
    it('binds multiplication tighter than addition', () => {
      expect(parseExpression('1 + 2 * 3')).toMatchObject({
        type: 'BinaryExpr',
        op: '+',
        left: num(1),
        right: { type: 'BinaryExpr', op: '*', left: num(2), right: num(3) },
      });
    });

    it('binds comparison tighter than equality', () => {
      expect(parseExpression('1 < 2 == True')).toMatchObject({
        op: '==',
        left: { op: '<', left: num(1), right: num(2) },
        right: { type: 'BoolLiteral', value: true },
      });
    });

    it('binds addition tighter than comparison', () => {
      expect(parseExpression('a + 1 >= b')).toMatchObject({
        op: '>=',
        left: { op: '+', left: id('a'), right: num(1) },
        right: id('b'),
      });
    });

    it('binds equality tighter than logical operators', () => {
      expect(parseExpression('a == 1 and b != 2')).toMatchObject({
        op: 'and',
        left: { op: '==' },
        right: { op: '!=' },
      });
    });

    it('binds unary tighter than multiplication', () => {
      expect(parseExpression('-x * 2')).toMatchObject({
        op: '*',
        left: { type: 'UnaryExpr', op: '-', operand: id('x') },
        right: num(2),
      });
    });

    it('binds not tighter than and', () => {
      expect(parseExpression('not a and b')).toMatchObject({
        op: 'and',
        left: { type: 'UnaryExpr', op: 'not', operand: id('a') },
        right: id('b'),
      });
    });

    it('lets parentheses override precedence without leaving a node', () => {
      expect(parseExpression('(1 + 2) * 3')).toMatchObject({
        op: '*',
        left: { type: 'BinaryExpr', op: '+', left: num(1), right: num(2) },
        right: num(3),
      });
    });
  });

  describe('Associativity', () => {
    it('folds subtraction to the left', () => {
      expect(parseExpression('10 - 3 - 2')).toMatchObject({
        op: '-',
        left: { op: '-', left: num(10), right: num(3) },
        right: num(2),
      });
    });

    it('folds division to the left', () => {
      expect(parseExpression('8 / 4 / 2')).toMatchObject({
        op: '/',
        left: { op: '/', left: num(8), right: num(4) },
        right: num(2),
      });
    });

    it('treats and/or as one left-associative layer', () => {
      expect(parseExpression('a or b and c')).toMatchObject({
        op: 'and',
        left: { op: 'or', left: id('a'), right: id('b') },
        right: id('c'),
      });
    });
  });

  describe('Unary', () => {
    it('stacks negation', () => {
      expect(parseExpression('- - 5')).toMatchObject({
        type: 'UnaryExpr',
        op: '-',
        operand: { type: 'UnaryExpr', op: '-', operand: num(5) },
      });
    });

    it('stacks mixed prefixes', () => {
      expect(parseExpression('not -x')).toMatchObject({
        op: 'not',
        operand: { op: '-', operand: id('x') },
      });
    });

    it('reads a negated operand after subtraction', () => {
      expect(parseExpression('1 - -2')).toMatchObject({
        type: 'BinaryExpr',
        op: '-',
        left: num(1),
        right: { type: 'UnaryExpr', op: '-', operand: num(2) },
      });
    });
  });

  describe('Calls', () => {
    it('parses a call with no arguments', () => {
      expect(parseExpression('f()')).toEqual({
        type: 'FunCall',
        name: 'f',
        args: [],
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 4, offset: 3 },
        },
      });
    });

    it('accepts a trailing comma', () => {
      expect(parseExpression('f(1,2,)')).toMatchObject({
        type: 'FunCall',
        name: 'f',
        args: [num(1), num(2)],
      });
    });

    it('parses nested calls and expression arguments', () => {
      expect(parseExpression('f(a + 1, g(2))')).toMatchObject({
        name: 'f',
        args: [
          { op: '+', left: id('a'), right: num(1) },
          { type: 'FunCall', name: 'g', args: [num(2)] },
        ],
      });
    });

    it('treats an identifier without ( as a variable', () => {
      expect(parseExpression('f')).toMatchObject(id('f'));
    });

    it('reports an unclosed argument list', () => {
      expect(failure('f(1').message).toBe(
        "Expected ')', got end of input. Hint: Check for unclosed parenthesis at 1:4"
      );
    });

    it('rejects a comma with no argument before it', () => {
      expect(failure('f(,)').message).toBe(
        "Expected expression, got ',' at 1:3"
      );
    });
  });

  describe('Literals', () => {
    it('parses keyword literals', () => {
      expect(parseExpression('True')).toMatchObject({
        type: 'BoolLiteral',
        value: true,
      });
      expect(parseExpression('False')).toMatchObject({
        type: 'BoolLiteral',
        value: false,
      });
      expect(parseExpression('Nil')).toMatchObject({ type: 'NilLiteral' });
    });

    it('keeps quotes on string literals', () => {
      expect(parseExpression('"hello"')).toMatchObject({
        type: 'StringLiteral',
        value: '"hello"',
      });
    });

    it('accepts the largest 32-bit signed integer', () => {
      expect(parseExpression('2147483647')).toMatchObject(num(2147483647));
    });

    it('rejects a literal one past the 32-bit range', () => {
      const err = failure('2147483648');
      expect(err).toBeInstanceOf(LiteralError);
      expect(err.errorId).toBe('ESTA-N001');
    });

    it('rejects an oversized literal with a literal-conversion error', () => {
      const err = failure('99999999999');

      expect(err).toBeInstanceOf(LiteralError);
      expect(err.category).toBe('literal');
      expect(err.message).toBe(
        'Number literal 99999999999 does not fit a 32-bit signed integer at 1:1'
      );
    });

    it('reads leading zeros as decimal', () => {
      expect(parseExpression('007')).toMatchObject(num(7));
    });
  });

  describe('Spans', () => {
    it('spans a binary expression from left to right operand', () => {
      expect(parseExpression('1 + 2').span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 6, offset: 5 },
      });
    });

    it('keeps the inner span for a grouped expression', () => {
      expect(parseExpression('(1)').span).toEqual({
        start: { line: 1, column: 2, offset: 1 },
        end: { line: 1, column: 3, offset: 2 },
      });
    });
  });

  describe('Errors', () => {
    it('rejects a dangling operator', () => {
      expect(failure('1 +').message).toBe(
        'Expected expression, got end of input at 1:4'
      );
    });

    it('rejects trailing tokens', () => {
      expect(failure('1 2').message).toBe(
        "Expected end of input, got '2' at 1:3"
      );
    });

    it('reports an unclosed group', () => {
      expect(failure('(1 + 2').errorId).toBe('ESTA-P002');
    });
  });
});

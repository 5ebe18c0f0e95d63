/**
 * Esta Parser Tests: Syntax Errors
 * Error ids, messages, locations and hints
 */

import { describe, expect, it } from 'vitest';

import {
  EstaError,
  LexerError,
  LiteralError,
  ParseError,
} from '../../src/index.js';
import { parseFailure } from '../helpers/parse.js';

describe('Esta Parser: Syntax Errors', () => {
  describe('Missing tokens', () => {
    it('rejects a declaration without a name', () => {
      const err = parseFailure('var ;');

      expect(err).toBeInstanceOf(ParseError);
      expect(err.errorId).toBe('ESTA-P002');
      expect(err.message).toBe("Expected identifier, got ';' at 1:5");
      expect(err.location).toEqual({ line: 1, column: 5, offset: 4 });
      expect(err.context).toEqual({ token: "';'", expected: 'identifier' });
    });

    it('rejects a statement missing its semicolon', () => {
      expect(parseFailure('x = 1').message).toBe(
        "Expected ';', got end of input at 1:6"
      );
    });

    it('rejects a block statement missing its semicolon', () => {
      expect(parseFailure('if x { y = 1 }').message).toBe(
        "Expected ';', got '}' at 1:14"
      );
    });

    it('rejects a call statement missing its semicolon', () => {
      expect(parseFailure('f() g();').message).toBe(
        "Expected ';', got 'g' at 1:5"
      );
    });

    it('hints at an unclosed brace', () => {
      const err = parseFailure('while x { f(); ');

      expect(err.message).toBe(
        "Expected '}', got end of input. Hint: Check for unclosed brace at 1:16"
      );
      expect(err.context).toMatchObject({
        hint: 'Hint: Check for unclosed brace',
      });
    });

    it('hints at a misspelled keyword literal', () => {
      expect(parseFailure('var x = 1 nil;').message).toBe(
        "Expected ';', got 'nil'. Hint: Did you mean 'Nil'? at 1:11"
      );
    });

    it('rejects a missing function name', () => {
      expect(parseFailure('fun (a) {}').message).toBe(
        "Expected function name, got '(' at 1:5"
      );
    });

    it('rejects a non-identifier parameter', () => {
      expect(parseFailure('fun f(1) {}').message).toBe(
        "Expected parameter name, got '1' at 1:7"
      );
    });
  });

  describe('Statement forms', () => {
    it('rejects a token that starts no statement', () => {
      const err = parseFailure('}');
      expect(err.errorId).toBe('ESTA-P001');
      expect(err.message).toBe("Unexpected token '}' at 1:1");
    });

    it('rejects a bare literal statement', () => {
      const err = parseFailure('if x { 1; }');

      expect(err.errorId).toBe('ESTA-P004');
      expect(err.message).toBe(
        'Only calls can be used as statements, got number literal at 1:8'
      );
    });

    it('rejects a bare identifier statement', () => {
      expect(parseFailure('x;').message).toBe(
        'Only calls can be used as statements, got identifier at 1:1'
      );
    });

    it('rejects a bare binary expression statement', () => {
      expect(parseFailure('a + b;').message).toBe(
        'Only calls can be used as statements, got binary expression at 1:1'
      );
    });

    it('hints at a misspelled statement keyword', () => {
      const err = parseFailure('retrun x;');

      expect(err.message).toBe(
        "Only calls can be used as statements, got identifier. Hint: Did you mean 'return'? at 1:1"
      );
      expect(err.context).toEqual({
        token: "'retrun'",
        node: 'identifier',
        hint: "Hint: Did you mean 'return'?",
      });
    });

    it('rejects a missing expression', () => {
      expect(parseFailure('x = ;').message).toBe(
        "Expected expression, got ';' at 1:5"
      );
    });
  });

  describe('Error classes', () => {
    it('reports parse errors through the shared base class', () => {
      const err = parseFailure('var ;');

      expect(err).toBeInstanceOf(EstaError);
      expect(err.name).toBe('ParseError');
      expect(err.category).toBe('parse');
    });

    it('strips the location from structured data', () => {
      expect(parseFailure('var ;').toData()).toEqual({
        errorId: 'ESTA-P002',
        message: "Expected identifier, got ';'",
        location: { line: 1, column: 5, offset: 4 },
        context: { token: "';'", expected: 'identifier' },
      });
    });

    it('raises literal errors from statements', () => {
      const err = parseFailure('x = 99999999999;');

      expect(err).toBeInstanceOf(LiteralError);
      expect(err.location).toEqual({ line: 1, column: 5, offset: 4 });
      expect(err instanceof LiteralError && err.literal).toBe('99999999999');
    });

    it('passes lexer errors through parse', () => {
      const err = parseFailure('x = "abc');

      expect(err).toBeInstanceOf(LexerError);
      expect(err.errorId).toBe('ESTA-L001');
    });

    it('reports the error on the correct line', () => {
      expect(parseFailure('var a;\nvar ;').location).toEqual({
        line: 2,
        column: 5,
        offset: 11,
      });
    });
  });
});

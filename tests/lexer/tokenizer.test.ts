/**
 * Esta Lexer Tests
 * Token classification, spans and lexical errors
 */

import { describe, expect, it } from 'vitest';

import {
  LexerError,
  parseTokens,
  tokenize,
  type Token,
} from '../../src/index.js';

function types(tokens: Token[]): string[] {
  return tokens.map((token) => token.type);
}

function caught(source: string): LexerError {
  try {
    tokenize(source);
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error(`Expected tokenize to fail: ${source}`);
}

describe('Esta Lexer', () => {
  describe('Token classification', () => {
    it('tokenizes a declaration', () => {
      const tokens = tokenize('var x = 10;');

      expect(types(tokens)).toEqual([
        'VAR',
        'IDENTIFIER',
        'ASSIGN',
        'NUMBER',
        'SEMICOLON',
        'EOF',
      ]);
      expect(tokens.map((token) => token.value)).toEqual([
        'var',
        'x',
        '=',
        '10',
        ';',
        '',
      ]);
    });

    it('prefers two-character operators', () => {
      expect(types(tokenize('<= >= == != < > ='))).toEqual([
        'LE',
        'GE',
        'EQ',
        'NE',
        'LT',
        'GT',
        'ASSIGN',
        'EOF',
      ]);
    });

    it('reads arithmetic and punctuation', () => {
      expect(types(tokenize('+-*/(){};,'))).toEqual([
        'PLUS',
        'MINUS',
        'STAR',
        'SLASH',
        'LPAREN',
        'RPAREN',
        'LBRACE',
        'RBRACE',
        'SEMICOLON',
        'COMMA',
        'EOF',
      ]);
    });

    it('recognizes every keyword', () => {
      expect(
        types(
          tokenize(
            'var while if else for fun return break continue and or not Nil True False'
          )
        )
      ).toEqual([
        'VAR',
        'WHILE',
        'IF',
        'ELSE',
        'FOR',
        'FUN',
        'RETURN',
        'BREAK',
        'CONTINUE',
        'AND',
        'OR',
        'NOT',
        'NIL',
        'TRUE',
        'FALSE',
        'EOF',
      ]);
    });

    it('treats keywords case-sensitively', () => {
      expect(types(tokenize('True true Nil nil'))).toEqual([
        'TRUE',
        'IDENTIFIER',
        'NIL',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('keeps underscores and digits inside identifiers', () => {
      const [token] = tokenize('loop_count2');
      expect(token).toMatchObject({ type: 'IDENTIFIER', value: 'loop_count2' });
    });

    it('does not split keywords out of longer identifiers', () => {
      expect(tokenize('variable')[0]).toMatchObject({
        type: 'IDENTIFIER',
        value: 'variable',
      });
    });

    it('splits a digit run from a following letter', () => {
      const tokens = tokenize('12ab');
      expect(types(tokens)).toEqual(['NUMBER', 'IDENTIFIER', 'EOF']);
      expect(tokens[0]?.value).toBe('12');
      expect(tokens[1]?.value).toBe('ab');
    });

    it('keeps quotes in string values', () => {
      expect(tokenize('"hi there"')[0]).toMatchObject({
        type: 'STRING',
        value: '"hi there"',
      });
    });

    it('allows newlines inside strings', () => {
      const tokens = tokenize('"a\nb" x');
      expect(tokens[0]?.value).toBe('"a\nb"');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 4, offset: 6 });
    });

    it('returns a lone EOF for empty or blank input', () => {
      expect(tokenize('')).toEqual([
        {
          type: 'EOF',
          value: '',
          span: {
            start: { line: 1, column: 1, offset: 0 },
            end: { line: 1, column: 1, offset: 0 },
          },
        },
      ]);
      expect(types(tokenize(' \t\r\n '))).toEqual(['EOF']);
    });
  });

  describe('Spans', () => {
    it('records start and end of each token', () => {
      const tokens = tokenize('var x');
      expect(tokens[1]?.span).toEqual({
        start: { line: 1, column: 5, offset: 4 },
        end: { line: 1, column: 6, offset: 5 },
      });
    });

    it('advances lines on LF', () => {
      const tokens = tokenize('a\n  b');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
    });

    it('offsets locations by a base location', () => {
      const tokens = tokenize('x', { line: 3, column: 5, offset: 20 });
      expect(tokens[0]?.span.start).toEqual({
        line: 3,
        column: 5,
        offset: 20,
      });
      expect(tokens[1]?.span.start).toEqual({
        line: 3,
        column: 6,
        offset: 21,
      });
    });

    it('continues lines and offsets from a base location', () => {
      const tokens = tokenize('a\nb', { line: 5, column: 10, offset: 100 });

      expect(tokens.map((token) => token.span.start)).toEqual([
        { line: 5, column: 10, offset: 100 },
        { line: 6, column: 1, offset: 102 },
        { line: 6, column: 2, offset: 103 },
      ]);
    });

    it('carries the base location into parsed spans', () => {
      const program = parseTokens(
        tokenize('x = 1;', { line: 5, column: 10, offset: 100 })
      );

      expect(program.statements[0]?.span).toEqual({
        start: { line: 5, column: 10, offset: 100 },
        end: { line: 5, column: 16, offset: 106 },
      });
    });
  });

  describe('Errors', () => {
    it('rejects an unterminated string at its opening quote', () => {
      const err = caught('x = "abc');

      expect(err.errorId).toBe('ESTA-L001');
      expect(err.message).toBe('Unterminated string literal at 1:5');
      expect(err.location).toEqual({ line: 1, column: 5, offset: 4 });
    });

    it('rejects characters outside the language', () => {
      const err = caught('x = 5 % 2;');

      expect(err.errorId).toBe('ESTA-L002');
      expect(err.message).toBe('Unexpected character: % at 1:7');
      expect(err.context).toEqual({ char: '%' });
    });

    it('rejects a leading underscore', () => {
      expect(caught('_x').message).toBe('Unexpected character: _ at 1:1');
    });

    it('rejects a lone exclamation mark', () => {
      expect(caught('!x').errorId).toBe('ESTA-L002');
    });

    it('uses the lexer category', () => {
      const err = caught('#');
      expect(err.name).toBe('LexerError');
      expect(err.category).toBe('lexer');
    });
  });
});

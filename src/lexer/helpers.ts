/**
 * Lexer Helper Functions
 * ASCII character classes and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const DIGIT = /^[0-9]$/;
const LETTER = /^[A-Za-z]$/;
const WORD_CHAR = /^[A-Za-z0-9_]$/;
const WHITESPACE = /^[ \t\r\n]$/;

export function isDigit(ch: string): boolean {
  return DIGIT.test(ch);
}

/** Identifiers start with a letter; underscores only follow */
export function isIdentifierStart(ch: string): boolean {
  return LETTER.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return WORD_CHAR.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Consume an operator lexeme and return its token */
export function advanceAndMakeToken(
  state: LexerState,
  type: TokenType,
  lexeme: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < lexeme.length; i++) advance(state);
  return makeToken(type, lexeme, start, currentLocation(state));
}

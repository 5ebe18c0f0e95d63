/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ';': TOKEN_TYPES.SEMICOLON,
  ',': TOKEN_TYPES.COMMA,
};

/** Keyword lookup table (case-sensitive) */
export const KEYWORDS: Record<string, TokenType> = {
  var: TOKEN_TYPES.VAR,
  while: TOKEN_TYPES.WHILE,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
  for: TOKEN_TYPES.FOR,
  fun: TOKEN_TYPES.FUN,
  return: TOKEN_TYPES.RETURN,
  break: TOKEN_TYPES.BREAK,
  continue: TOKEN_TYPES.CONTINUE,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
  Nil: TOKEN_TYPES.NIL,
  True: TOKEN_TYPES.TRUE,
  False: TOKEN_TYPES.FALSE,
};

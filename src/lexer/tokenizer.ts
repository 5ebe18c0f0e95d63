/**
 * Tokenizer
 * Whitespace skipping and token dispatch by first character
 */

import type { Token, SourceLocation } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  consumeWhile,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

export function nextToken(state: LexerState): Token {
  consumeWhile(state, isWhitespace);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  // Digits only; a leading '-' is the parser's unary minus
  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Longest match first: '<=' before '<'
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, singleCharType, ch, start);
  }

  throw new LexerError('ESTA-L002', `Unexpected character: ${ch}`, start, {
    char: ch,
  });
}

/**
 * Convert source text into tokens. The result always ends with one EOF
 * token.
 *
 * @param baseLocation - Location of the first character when the source is
 * a fragment of a larger document
 */
export function tokenize(
  source: string,
  baseLocation?: SourceLocation
): Token[] {
  const state = createLexerState(source, baseLocation);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}

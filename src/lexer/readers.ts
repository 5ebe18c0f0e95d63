/**
 * Token Readers
 * One reader per multi-character token class. Each starts at the token's
 * first character and stops after its last.
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  consumeWhile,
  currentLocation,
  isAtEnd,
  type LexerState,
} from './state.js';

/**
 * "..." with no escapes and newlines allowed. The token value is the whole
 * lexeme, quotes included.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const open = advance(state);
  const body = consumeWhile(state, (ch) => ch !== '"');

  if (isAtEnd(state)) {
    throw new LexerError('ESTA-L001', 'Unterminated string literal', start);
  }

  const close = advance(state);
  return makeToken(
    TOKEN_TYPES.STRING,
    open + body + close,
    start,
    currentLocation(state)
  );
}

/** Decimal digits as text. The parser checks the range. */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const digits = consumeWhile(state, isDigit);
  return makeToken(TOKEN_TYPES.NUMBER, digits, start, currentLocation(state));
}

/** Identifier, or keyword when the whole word is one */
export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const word = consumeWhile(state, isIdentifierChar);
  const keyword = Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined;
  return makeToken(
    keyword ?? TOKEN_TYPES.IDENTIFIER,
    word,
    start,
    currentLocation(state)
  );
}

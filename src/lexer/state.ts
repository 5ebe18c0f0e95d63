/**
 * Lexer State
 * Cursor over the source text. Locations are reported relative to an
 * optional origin so fragments of a larger document keep document positions.
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Index of the next unread character in source */
  pos: number;
  line: number;
  column: number;
  /** Document offset of source[0] */
  readonly origin: number;
}

export function createLexerState(
  source: string,
  origin?: SourceLocation
): LexerState {
  return {
    source,
    pos: 0,
    line: origin?.line ?? 1,
    column: origin?.column ?? 1,
    origin: origin?.offset ?? 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.origin + state.pos,
  };
}

/** Next unread character, or '' at end of input */
export function peek(state: LexerState): string {
  return state.source.charAt(state.pos);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one character. LF starts a new line. */
export function advance(state: LexerState): string {
  const ch = peek(state);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume characters while the predicate holds and return them */
export function consumeWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): string {
  let text = '';
  while (!isAtEnd(state) && predicate(peek(state))) {
    text += advance(state);
  }
  return text;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/**
 * Parser State
 * Core state management, options and token navigation utilities
 */

import type {
  EstaError,
  SourceLocation,
  SourceSpan,
  StatementNode,
  Token,
  TokenType,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// OPTIONS
// ============================================================

/**
 * Handling of the `;` between a for-loop's increment clause and its body.
 * - optional: accepted when present
 * - required: must be present (`for a; b; c; { }`)
 * - forbidden: must be absent (`for a; b; c { }`)
 */
export type ForLoopSemicolon = 'optional' | 'required' | 'forbidden';

const FOR_LOOP_SEMICOLON_MODES: readonly ForLoopSemicolon[] = [
  'optional',
  'required',
  'forbidden',
];

/** Event emitted after each top-level statement is parsed */
export interface StatementEvent {
  /** Statement index (0-based) */
  index: number;
  statement: StatementNode;
}

/** Event emitted when parsing fails, before the error is rethrown */
export interface ParseErrorEvent {
  error: EstaError;
}

/** Host hooks for observing a parse. The parser itself never logs. */
export interface ParseCallbacks {
  onStatement?: ((event: StatementEvent) => void) | undefined;
  onError?: ((event: ParseErrorEvent) => void) | undefined;
}

export interface ParseOptions {
  forLoopSemicolon?: ForLoopSemicolon | undefined;
  callbacks?: ParseCallbacks | undefined;
}

interface ResolvedParseOptions {
  readonly forLoopSemicolon: ForLoopSemicolon;
  readonly callbacks: ParseCallbacks;
}

function isForLoopSemicolon(value: unknown): value is ForLoopSemicolon {
  return FOR_LOOP_SEMICOLON_MODES.some((mode) => mode === value);
}

/**
 * Apply defaults and validate option values.
 * @throws TypeError for an unknown forLoopSemicolon mode
 */
export function resolveParseOptions(
  options: ParseOptions = {}
): ResolvedParseOptions {
  const forLoopSemicolon = options.forLoopSemicolon ?? 'optional';
  if (!isForLoopSemicolon(forLoopSemicolon)) {
    throw new TypeError(
      `Invalid forLoopSemicolon: ${String(forLoopSemicolon)} (must be 'optional', 'required', or 'forbidden')`
    );
  }
  return { forLoopSemicolon, callbacks: options.callbacks ?? {} };
}

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  readonly options: ResolvedParseOptions;
}

export function createParserState(
  tokens: Token[],
  options: ParseOptions = {}
): ParserState {
  if (tokens[tokens.length - 1]?.type !== TOKEN_TYPES.EOF) {
    throw new TypeError('Token stream must end with an EOF token');
  }
  return {
    tokens,
    pos: 0,
    options: resolveParseOptions(options),
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or fail with ESTA-P002.
 * @param expected - Description used in the message, e.g. "';'"
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  throw withHint(
    ParseError.at('ESTA-P002', token, { expected }),
    generateHint(type, token)
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

const TYPO_HINTS: Record<string, string> = {
  true: 'True',
  false: 'False',
  nil: 'Nil',
  null: 'Nil',
  retrun: 'return',
  reutrn: 'return',
  whiel: 'while',
  wihle: 'while',
  fucn: 'fun',
  function: 'fun',
  let: 'var',
  brek: 'break',
  contineu: 'continue',
};

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: TokenType, actual: Token): string | null {
  if (actual.type === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RBRACE) {
      return 'Hint: Check for unclosed brace';
    }
    if (expectedType === TOKEN_TYPES.RPAREN) {
      return 'Hint: Check for unclosed parenthesis';
    }
  }

  return typoHint(actual);
}

/**
 * Suggest a keyword for an identifier that looks like a misspelled one.
 * @internal
 */
export function typoHint(token: Token): string | null {
  if (token.type !== TOKEN_TYPES.IDENTIFIER) return null;
  if (!Object.hasOwn(TYPO_HINTS, token.value)) return null;
  const suggestion = TYPO_HINTS[token.value];
  return suggestion ? `Hint: Did you mean '${suggestion}'?` : null;
}

/**
 * Append a hint to a parse error's message and context.
 * @internal
 */
export function withHint(error: ParseError, hint: string | null): ParseError {
  if (!hint) return error;
  return new ParseError(
    error.errorId,
    `${error.toData().message}. ${hint}`,
    error.location,
    { ...error.context, hint }
  );
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** End location of the most recently consumed token */
export function previousEnd(state: ParserState): SourceLocation {
  const previous = state.tokens[state.pos - 1] ?? current(state);
  return previous.span.end;
}

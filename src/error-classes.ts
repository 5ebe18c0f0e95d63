/**
 * Esta Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import type { ErrorCategory } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface EstaErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Renders the registered message template with context and builds the
 * class matching the id's category: LexerError, ParseError or LiteralError.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('ESTA-N001', { value: '99999999999' }, location)
 * // LiteralError: "Number literal 99999999999 does not fit a 32-bit signed integer at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): EstaError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, message, location, context);
    case 'parse':
      return new ParseError(errorId, message, location, context);
    case 'literal':
      return new LiteralError(String(context['value'] ?? ''), location);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Esta errors.
 * Provides structured data for host applications to format as needed.
 */
export class EstaError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: EstaErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'EstaError';
    this.errorId = data.errorId;
    this.category = definition.category;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): EstaErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: EstaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Looks up a definition and checks it belongs to the expected category.
 * @internal
 */
export function requireCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** Lexical errors (ESTA-L0xx). Always located at the offending character. */
export class LexerError extends EstaError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Parse-time syntax errors */
export class ParseError extends EstaError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }

  /**
   * Create from the registered template, located at the offending token.
   * The token's description is added to context as `token`.
   */
  static at(
    errorId: string,
    token: { value: string; type: string; span: { start: SourceLocation } },
    context: Record<string, unknown> = {}
  ): ParseError {
    const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? '';
    const fullContext = { token: describeToken(token), ...context };
    return new ParseError(
      errorId,
      renderMessage(template, fullContext),
      token.span.start,
      fullContext
    );
  }
}

/** Numeric literal conversion failures */
export class LiteralError extends EstaError {
  override readonly location: SourceLocation;
  readonly literal: string;

  constructor(literal: string, location: SourceLocation) {
    const context = { value: literal };
    const template = ERROR_REGISTRY.get('ESTA-N001')?.messageTemplate ?? '';
    super({
      errorId: 'ESTA-N001',
      message: renderMessage(template, context),
      location,
      context,
    });
    this.name = 'LiteralError';
    this.location = location;
    this.literal = literal;
  }
}

/** Human-readable token description used in messages */
export function describeToken(token: { value: string; type: string }): string {
  if (token.type === 'EOF') return 'end of input';
  return `'${token.value}'`;
}

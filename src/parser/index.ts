/**
 * Esta Parser
 * Main entry points and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type {
  ExpressionNode,
  ProgramNode,
  StatementNode,
  Token,
} from '../types.js';
import { EstaError, TOKEN_TYPES } from '../types.js';
import { Parser } from './parser.js';
import { expect, type ParseOptions } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Run a parse, reporting lexer and parser failures to the onError
 * callback before rethrowing them.
 */
function observe<T>(options: ParseOptions | undefined, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof EstaError) {
      options?.callbacks?.onError?.({ error: err });
    }
    throw err;
  }
}

/**
 * Parse Esta source code into an AST.
 *
 * Throws LexerError, ParseError or LiteralError on the first failure.
 * There is no recovery and no partial result.
 *
 * @example
 * ```typescript
 * const ast = parse('var x = 1 + 2;');
 * ast.statements[0]?.type; // 'Declaration'
 * ```
 */
export function parse(source: string, options?: ParseOptions): ProgramNode {
  return observe(options, () =>
    new Parser(tokenize(source), options).parse()
  );
}

/**
 * Parse an existing token stream. The stream must end with an EOF token.
 */
export function parseTokens(
  tokens: Token[],
  options?: ParseOptions
): ProgramNode {
  return observe(options, () => new Parser(tokens, options).parse());
}

/**
 * Parse exactly one statement. Trailing tokens are an error.
 */
export function parseStatement(
  source: string,
  options?: ParseOptions
): StatementNode {
  return observe(options, () => {
    const parser = new Parser(tokenize(source), options);
    const statement = parser.parseStatement();
    expect(parser.state, TOKEN_TYPES.EOF, 'end of input');
    return statement;
  });
}

/**
 * Parse exactly one expression. Trailing tokens are an error.
 *
 * @example
 * ```typescript
 * parseExpression('1 + 2 * 3'); // BinaryExpr '+' with a '*' on the right
 * ```
 */
export function parseExpression(
  source: string,
  options?: ParseOptions
): ExpressionNode {
  return observe(options, () => {
    const parser = new Parser(tokenize(source), options);
    const expression = parser.parseExpression();
    expect(parser.state, TOKEN_TYPES.EOF, 'end of input');
    return expression;
  });
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State and options (for advanced usage)
export {
  createParserState,
  type ForLoopSemicolon,
  type ParseCallbacks,
  type ParseErrorEvent,
  type ParseOptions,
  type ParserState,
  type StatementEvent,
} from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

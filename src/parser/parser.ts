/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: program, statement dispatch, simple statements
 * - parser-control.ts: blocks, while, if, for
 * - parser-functions.ts: function declarations, calls, comma lists
 * - parser-expr.ts: precedence chain from logical down to unary
 * - parser-literals.ts: primary expressions and literals
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const ast = parser.parse();
 * ```
 */

import type { ProgramNode, Token } from '../types.js';
import {
  type ParserState,
  type ParseOptions,
  createParserState,
} from './state.js';

export class Parser {
  /** Token stream and position. Owned by this parser alone. */
  state: ParserState;

  constructor(tokens: Token[], options?: ParseOptions) {
    this.state = createParserState(tokens, options);
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }
}

/**
 * Esta Module
 * Exports lexer, parser, printer and AST types
 */

export { tokenize } from './lexer/index.js';
export {
  createParserState,
  type ForLoopSemicolon,
  parse,
  parseExpression,
  type ParseCallbacks,
  type ParseErrorEvent,
  type ParseOptions,
  Parser,
  type ParserState,
  parseStatement,
  parseTokens,
  type StatementEvent,
} from './parser/index.js';
export {
  type FormatOptions,
  formatExpression,
  formatProgram,
  formatStatement,
} from './printer.js';
export { astEquals } from './ast-equals.js';

export * from './types.js';

/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'literal';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: ESTA-{L|P|N}{3-digit} (e.g., ESTA-P002) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Error definitions by id. Read-only once built. */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    this.byId = new Map(
      definitions.map((def): [string, ErrorDefinition] => [def.errorId, def])
    );
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (ESTA-L0xx)
  {
    errorId: 'ESTA-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a double quote but never closed.',
    resolution: 'Add the closing double quote.',
    examples: [{ description: 'Missing closing quote', code: 'var s = "hi;' }],
  },
  {
    errorId: 'ESTA-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of any token.',
    resolution: 'Remove the character or replace it with a valid operator.',
    examples: [{ description: 'Modulo is not an operator', code: 'x = 5 % 2;' }],
  },

  // Parse Errors (ESTA-P0xx)
  {
    errorId: 'ESTA-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token {token}',
    cause: 'Token cannot start a statement.',
    resolution: 'Start the statement with a keyword, an assignment target or a call.',
    examples: [{ description: 'Stray closing brace', code: '}' }],
  },
  {
    errorId: 'ESTA-P002',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expected {expected}, got {token}',
    cause: 'A required terminator, brace, parenthesis or name is missing.',
    resolution: 'Insert the expected token.',
    examples: [
      { description: 'Missing statement terminator', code: 'x = 1' },
      { description: 'Missing declared name', code: 'var ;' },
    ],
  },
  {
    errorId: 'ESTA-P003',
    category: 'parse',
    description: 'Expected expression',
    messageTemplate: 'Expected expression, got {token}',
    cause: 'Token cannot start an expression.',
    resolution: 'Supply a literal, identifier, call, prefix operator or parenthesized expression.',
    examples: [{ description: 'Dangling operator', code: 'x = 1 + ;' }],
  },
  {
    errorId: 'ESTA-P004',
    category: 'parse',
    description: 'Expression statement is not a call',
    messageTemplate: 'Only calls can be used as statements, got {node}',
    cause: 'A bare expression other than a call was used as a statement.',
    resolution: 'Assign the value with = or remove the statement.',
    examples: [{ description: 'Bare literal', code: '1;' }],
  },
  {
    errorId: 'ESTA-P005',
    category: 'parse',
    description: 'Semicolon before for-loop body',
    messageTemplate: "Unexpected ';' before for-loop body",
    cause: "forLoopSemicolon is 'forbidden' and a ';' follows the increment clause.",
    resolution: "Remove the ';' or parse with forLoopSemicolon 'optional'.",
    examples: [{ description: 'Trailing separator', code: 'for i; i < 3; i; { }' }],
  },

  // Literal Errors (ESTA-N0xx)
  {
    errorId: 'ESTA-N001',
    category: 'literal',
    description: 'Number literal out of range',
    messageTemplate: 'Number literal {value} does not fit a 32-bit signed integer',
    cause: 'Digit sequence exceeds 2147483647.',
    resolution: 'Use a smaller literal.',
    examples: [{ description: 'Eleven digits', code: 'x = 99999999999;' }],
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

const PLACEHOLDER = /\{([^{}]*)\}/g;

/**
 * Replaces {name} placeholders with values from context.
 * Missing values render as empty strings. An unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage('Expected {expected}, got {token}', { expected: "';'", token: "'}'" })
 * // "Expected ';', got '}'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  const lastOpen = template.lastIndexOf('{');
  if (lastOpen !== -1 && !template.includes('}', lastOpen)) {
    return template;
  }

  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = context[key];
    return value === undefined ? '' : String(value);
  });
}

/**
 * Esta Types
 * Aggregates token, AST and error definitions for internal imports
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';

/**
 * Git module - execution, parsing and repository access
 */

export * from './types.js';
export * from './executor.js';
export * from './parser.js';
export * from './repository.js';
export * from './locator.js';

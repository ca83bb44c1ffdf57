/**
 * git-object-graph
 *
 * Extracts the commit/tree/blob object graph of a git repository into a
 * deduplicated node/edge store and exports it for rendering.
 */

export * from './git/index.js';
export * from './store/index.js';
export * from './graph/index.js';

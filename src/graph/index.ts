/**
 * Graph module - extraction pipeline and export
 */

export * from './writer.js';
export * from './tree-walker.js';
export * from './history-walker.js';
export * from './parse.js';
export * from './exporter.js';

/**
 * Graph store module - durable node/edge storage
 */

export * from './types.js';
export * from './database-client.js';
export * from './sql-js-client.js';
export * from './migrations.js';
export * from './sql-graph-store.js';

/**
 * Graph storage types
 */

import type { GitGraphResult } from '../git/types.js';

/**
 * Identifier of one parsed upload; separates graphs that share object ids
 */
export type GraphScope = number;

export type NodeType = 'commit' | 'tree' | 'blob';

export type EdgeRelation = 'parent' | 'commit->tree' | 'tree->tree' | 'tree->blob';

/**
 * Free-form string fields attached to a node (author, email, time for commits)
 */
export type NodeMetadata = Readonly<Record<string, string>>;

/**
 * A stored object; `(id, graphScope)` is its identity
 */
export interface GraphNode {
  readonly id: string;
  readonly graphScope: GraphScope;
  readonly type: NodeType;
  readonly label: string;
  readonly metadata: NodeMetadata | null;
}

/**
 * A stored relation; edges have no identity and may repeat
 */
export interface GraphEdge {
  readonly graphScope: GraphScope;
  readonly source: string;
  readonly target: string;
  readonly relation: EdgeRelation;
}

export interface Upload {
  readonly id: GraphScope;
  readonly name: string;
  readonly createdAt: Date;
}

/**
 * Durable keyed storage for graph nodes and edges
 *
 * Every operation reports failure through its result instead of throwing.
 */
export interface GraphStore {
  /** Write the node, replacing any stored record with the same `(id, graphScope)` */
  upsertAuthoritative(node: GraphNode): Promise<GitGraphResult<void>>;

  /** Write the node unless a record with the same `(id, graphScope)` exists */
  insertIfAbsent(node: GraphNode): Promise<GitGraphResult<void>>;

  /** Append an edge; duplicates are kept */
  appendEdge(edge: GraphEdge): Promise<GitGraphResult<void>>;

  /** All nodes of a scope, in insertion order */
  listNodes(scope: GraphScope): Promise<GitGraphResult<GraphNode[]>>;

  /** All edges of a scope, in insertion order */
  listEdges(scope: GraphScope): Promise<GitGraphResult<GraphEdge[]>>;

  /** Register an upload and return its new scope */
  createUpload(name: string): Promise<GitGraphResult<Upload>>;

  getUpload(scope: GraphScope): Promise<GitGraphResult<Upload | null>>;

  listUploads(): Promise<GitGraphResult<Upload[]>>;

  /** Persist everything written so far */
  flush(): Promise<GitGraphResult<void>>;

  /** Flush and release the underlying database */
  close(): Promise<GitGraphResult<void>>;
}

const NODE_TYPES: ReadonlySet<string> = new Set<NodeType>(['commit', 'tree', 'blob']);
const EDGE_RELATIONS: ReadonlySet<string> = new Set<EdgeRelation>([
  'parent',
  'commit->tree',
  'tree->tree',
  'tree->blob',
]);

export function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.has(value);
}

export function isEdgeRelation(value: string): value is EdgeRelation {
  return EDGE_RELATIONS.has(value);
}

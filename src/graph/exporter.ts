/**
 * Graph exporter
 *
 * Turns the stored rows of one scope into the node/link structure the
 * rendering client consumes. Layout is the client's job; output follows
 * store order.
 */

import type { GitGraphResult } from '../git/types.js';
import { ok } from '../git/types.js';
import type {
  GraphEdge,
  GraphNode,
  GraphScope,
  GraphStore,
  NodeMetadata,
  NodeType,
} from '../store/types.js';

/**
 * Length of the abbreviated id shown for unlabelled nodes
 */
export const SHORT_ID_LENGTH = 7;

export interface CommitExtra {
  readonly message?: string;
  readonly author?: string;
  readonly email?: string;
  readonly date?: string;
}

export interface BlobExtra {
  readonly filename: string;
}

export interface ExportedNode {
  readonly id: string;
  readonly type: NodeType;
  readonly label?: string;
  readonly extra?: CommitExtra | BlobExtra;
}

export interface ExportedLink {
  readonly source: string;
  readonly target: string;
  readonly rel?: string;
}

export interface ExportedGraph {
  readonly nodes: ExportedNode[];
  readonly links: ExportedLink[];
}

/**
 * Read and transform every node and edge of `scope`
 */
export async function exportGraph(
  store: GraphStore,
  scope: GraphScope
): Promise<GitGraphResult<ExportedGraph>> {
  const nodesResult = await store.listNodes(scope);
  if (!nodesResult.ok) {
    return nodesResult;
  }

  const edgesResult = await store.listEdges(scope);
  if (!edgesResult.ok) {
    return edgesResult;
  }

  return ok({
    nodes: nodesResult.value.map(toExportedNode),
    links: edgesResult.value.map(toExportedLink),
  });
}

/**
 * Display label: the stored label, or the short id when that is empty
 */
export function displayLabel(node: Pick<GraphNode, 'id' | 'label'>): string {
  return node.label === '' ? node.id.slice(0, SHORT_ID_LENGTH) : node.label;
}

export function toExportedNode(node: GraphNode): ExportedNode {
  const label = displayLabel(node);

  switch (node.type) {
    case 'commit': {
      const meta: NodeMetadata = node.metadata ?? {};
      const extra: CommitExtra = {
        message: node.label,
        author: meta['author'],
        email: meta['email'],
        date: meta['time'],
      };
      return { id: node.id, type: node.type, label, extra };
    }
    case 'blob':
      return { id: node.id, type: node.type, label, extra: { filename: node.label } };
    case 'tree':
      return { id: node.id, type: node.type, label };
  }
}

export function toExportedLink(edge: GraphEdge): ExportedLink {
  return { source: edge.source, target: edge.target, rel: edge.relation };
}

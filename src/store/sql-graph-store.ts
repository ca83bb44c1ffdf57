/**
 * SQLite-backed GraphStore
 *
 * Nodes are keyed by `(id, upload_id)`; the two node write modes map onto
 * SQLite's conflict clauses. Edges are an unkeyed append-only table.
 */

import type { GitGraphResult } from '../git/types.js';
import { err, ok } from '../git/types.js';
import type { DatabaseClient, Row } from './database-client.js';
import { initializeSchema } from './migrations.js';
import { SqlJsClient } from './sql-js-client.js';
import type {
  GraphEdge,
  GraphNode,
  GraphScope,
  GraphStore,
  NodeMetadata,
  Upload,
} from './types.js';
import { isEdgeRelation, isNodeType } from './types.js';

export interface OpenGraphStoreOptions {
  /** Database file; omit for an in-memory store */
  readonly path?: string;
}

/**
 * Open (and migrate) a graph database backed by sql.js
 */
export async function openGraphStore(
  options: OpenGraphStoreOptions = {}
): Promise<GitGraphResult<SqlGraphStore>> {
  let client: SqlJsClient | undefined;
  try {
    client = await SqlJsClient.open({ path: options.path });
    await initializeSchema(client);
    return ok(new SqlGraphStore(client));
  } catch (error) {
    await client?.discard();
    return err({
      type: 'store_failed',
      message: `Cannot open graph database${options.path ? ` at ${options.path}` : ''}: ${describeError(error)}`,
    });
  }
}

export class SqlGraphStore implements GraphStore {
  constructor(private readonly db: DatabaseClient) {}

  upsertAuthoritative(node: GraphNode): Promise<GitGraphResult<void>> {
    return this.attempt(`upsert node ${node.id}`, async () => {
      await this.db.execute(
        'INSERT OR REPLACE INTO nodes (id, upload_id, type, label, meta) VALUES (?, ?, ?, ?, ?)',
        [node.id, node.graphScope, node.type, node.label, encodeMetadata(node.metadata)]
      );
    });
  }

  insertIfAbsent(node: GraphNode): Promise<GitGraphResult<void>> {
    return this.attempt(`insert node ${node.id}`, async () => {
      await this.db.execute(
        'INSERT OR IGNORE INTO nodes (id, upload_id, type, label, meta) VALUES (?, ?, ?, ?, ?)',
        [node.id, node.graphScope, node.type, node.label, encodeMetadata(node.metadata)]
      );
    });
  }

  appendEdge(edge: GraphEdge): Promise<GitGraphResult<void>> {
    return this.attempt(`append edge ${edge.source} -> ${edge.target}`, async () => {
      await this.db.execute(
        'INSERT INTO edges (upload_id, source, target, rel) VALUES (?, ?, ?, ?)',
        [edge.graphScope, edge.source, edge.target, edge.relation]
      );
    });
  }

  listNodes(scope: GraphScope): Promise<GitGraphResult<GraphNode[]>> {
    return this.attempt(`list nodes of ${scope}`, async () => {
      const rows = await this.db.query(
        'SELECT id, type, label, meta FROM nodes WHERE upload_id = ? ORDER BY rowid',
        [scope]
      );
      const nodes: GraphNode[] = [];
      for (const row of rows) {
        const type = text(row, 'type');
        // Rows written by something other than this store are left out
        if (!isNodeType(type)) {
          continue;
        }
        nodes.push({
          id: text(row, 'id'),
          graphScope: scope,
          type,
          label: text(row, 'label'),
          metadata: decodeMetadata(text(row, 'meta')),
        });
      }
      return nodes;
    });
  }

  listEdges(scope: GraphScope): Promise<GitGraphResult<GraphEdge[]>> {
    return this.attempt(`list edges of ${scope}`, async () => {
      const rows = await this.db.query(
        'SELECT source, target, rel FROM edges WHERE upload_id = ? ORDER BY rowid',
        [scope]
      );
      const edges: GraphEdge[] = [];
      for (const row of rows) {
        const relation = text(row, 'rel');
        if (!isEdgeRelation(relation)) {
          continue;
        }
        edges.push({
          graphScope: scope,
          source: text(row, 'source'),
          target: text(row, 'target'),
          relation,
        });
      }
      return edges;
    });
  }

  createUpload(name: string): Promise<GitGraphResult<Upload>> {
    return this.attempt(`create upload ${name}`, async () => {
      const createdAt = new Date();
      const { lastInsertRowId } = await this.db.execute(
        'INSERT INTO uploads (name, created_at) VALUES (?, ?)',
        [name, createdAt.getTime()]
      );
      return { id: lastInsertRowId, name, createdAt };
    });
  }

  getUpload(scope: GraphScope): Promise<GitGraphResult<Upload | null>> {
    return this.attempt(`read upload ${scope}`, async () => {
      const rows = await this.db.query(
        'SELECT id, name, created_at FROM uploads WHERE id = ?',
        [scope]
      );
      const row = rows[0];
      return row ? toUpload(row) : null;
    });
  }

  listUploads(): Promise<GitGraphResult<Upload[]>> {
    return this.attempt('list uploads', async () => {
      const rows = await this.db.query('SELECT id, name, created_at FROM uploads ORDER BY id');
      return rows.map(toUpload);
    });
  }

  flush(): Promise<GitGraphResult<void>> {
    return this.attempt('flush', () => this.db.flush());
  }

  close(): Promise<GitGraphResult<void>> {
    return this.attempt('close', () => this.db.close());
  }

  private async attempt<T>(operation: string, fn: () => Promise<T>): Promise<GitGraphResult<T>> {
    try {
      return ok(await fn());
    } catch (error) {
      return err({
        type: 'store_failed',
        message: `Graph store ${operation} failed: ${describeError(error)}`,
      });
    }
  }
}

// ============================================
// ROW MAPPING
// ============================================

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') {
    return value;
  }
  return value === null || value === undefined ? '' : String(value);
}

function integer(row: Row, column: string): number {
  const value = row[column];
  return typeof value === 'number' ? value : Number(value);
}

function toUpload(row: Row): Upload {
  return {
    id: integer(row, 'id'),
    name: text(row, 'name'),
    createdAt: new Date(integer(row, 'created_at')),
  };
}

function encodeMetadata(metadata: NodeMetadata | null): string {
  return metadata ? JSON.stringify(metadata) : '';
}

/**
 * Parse stored metadata; anything that is not an object of strings yields null
 */
function decodeMetadata(raw: string): NodeMetadata | null {
  if (raw === '') {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      metadata[key] = value;
    }
  }
  return metadata;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

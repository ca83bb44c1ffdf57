/**
 * Graph writer
 *
 * Binds a store to one graph scope for the length of a parse run, applies
 * the per-type write semantics, counts writes and turns store failures
 * into `graph_incomplete` errors.
 */

import type { GitGraphResult, ObjectId } from '../git/types.js';
import { err, ok } from '../git/types.js';
import type {
  EdgeRelation,
  GraphNode,
  GraphScope,
  GraphStore,
  NodeMetadata,
} from '../store/types.js';

export interface WriteStats {
  /** Node writes sent to the store */
  nodeWrites: number;
  /** Node writes skipped because this run already made them */
  cachedNodeWrites: number;
  /** Edge writes sent to the store */
  edgeWrites: number;
  /** Flushes made during the run */
  flushes: number;
}

export interface GraphWriterOptions {
  /**
   * Skip node writes this run has already made with the same effect
   * (default: true). Edge writes are never skipped.
   */
  readonly cacheNodeWrites?: boolean;
  /**
   * Flush the store after this many writes (default: 1000; 0 disables),
   * bounding what a crash mid-walk can lose
   */
  readonly flushEvery?: number;
}

const DEFAULT_FLUSH_EVERY = 1000;

export class GraphWriter {
  readonly stats: WriteStats = {
    nodeWrites: 0,
    cachedNodeWrites: 0,
    edgeWrites: 0,
    flushes: 0,
  };

  private readonly cacheNodeWrites: boolean;
  private readonly flushEvery: number;
  private unflushed = 0;
  /** Ids known to have a stored record in this scope */
  private readonly present = new Set<string>();
  /** Commits already written with full metadata */
  private readonly authoritativeCommits = new Set<string>();

  constructor(
    private readonly store: GraphStore,
    readonly scope: GraphScope,
    options: GraphWriterOptions = {}
  ) {
    this.cacheNodeWrites = options.cacheNodeWrites ?? true;
    this.flushEvery = options.flushEvery ?? DEFAULT_FLUSH_EVERY;
  }

  /**
   * A visited commit; overwrites any earlier record
   * A commit's content is fixed by its hash, so one write per run suffices.
   */
  async commit(id: ObjectId, label: string, metadata: NodeMetadata): Promise<GitGraphResult<void>> {
    if (this.cacheNodeWrites && this.authoritativeCommits.has(id)) {
      this.stats.cachedNodeWrites++;
      return ok(undefined);
    }

    const result = await this.write('upsertAuthoritative', this.node(id, 'commit', label, metadata));
    if (result.ok) {
      this.authoritativeCommits.add(id);
      this.present.add(id);
    }
    return result;
  }

  /**
   * A parent commit not yet visited; never replaces an existing record
   */
  placeholderCommit(id: ObjectId): Promise<GitGraphResult<void>> {
    return this.insertIfAbsent(this.node(id, 'commit', '', null));
  }

  /**
   * A tree; the first label written for an id is permanent
   */
  tree(id: ObjectId, label: string): Promise<GitGraphResult<void>> {
    return this.insertIfAbsent(this.node(id, 'tree', label, null));
  }

  /**
   * A blob; the last filename written wins, so it is never cached
   */
  async blob(id: ObjectId, label: string): Promise<GitGraphResult<void>> {
    const result = await this.write('upsertAuthoritative', this.node(id, 'blob', label, null));
    if (result.ok) {
      this.present.add(id);
    }
    return result;
  }

  async edge(source: ObjectId, target: ObjectId, relation: EdgeRelation): Promise<GitGraphResult<void>> {
    const result = await this.store.appendEdge({ graphScope: this.scope, source, target, relation });
    if (!result.ok) {
      return this.incomplete(result.error.message);
    }
    this.stats.edgeWrites++;
    return this.afterWrite();
  }

  private async insertIfAbsent(node: GraphNode): Promise<GitGraphResult<void>> {
    if (this.cacheNodeWrites && this.present.has(node.id)) {
      this.stats.cachedNodeWrites++;
      return ok(undefined);
    }

    const result = await this.write('insertIfAbsent', node);
    if (result.ok) {
      this.present.add(node.id);
    }
    return result;
  }

  private async write(
    mode: 'upsertAuthoritative' | 'insertIfAbsent',
    node: GraphNode
  ): Promise<GitGraphResult<void>> {
    const result =
      mode === 'upsertAuthoritative'
        ? await this.store.upsertAuthoritative(node)
        : await this.store.insertIfAbsent(node);
    if (!result.ok) {
      return this.incomplete(result.error.message);
    }
    this.stats.nodeWrites++;
    return this.afterWrite();
  }

  private async afterWrite(): Promise<GitGraphResult<void>> {
    this.unflushed++;
    if (this.flushEvery <= 0 || this.unflushed < this.flushEvery) {
      return ok(undefined);
    }

    this.unflushed = 0;
    const result = await this.store.flush();
    if (!result.ok) {
      return this.incomplete(result.error.message);
    }
    this.stats.flushes++;
    return ok(undefined);
  }

  private node(
    id: ObjectId,
    type: GraphNode['type'],
    label: string,
    metadata: NodeMetadata | null
  ): GraphNode {
    return { id, graphScope: this.scope, type, label, metadata };
  }

  private incomplete(cause: string): GitGraphResult<void> {
    return err({
      type: 'graph_incomplete',
      message: `Graph ${this.scope} is incomplete: ${cause}`,
    });
  }
}

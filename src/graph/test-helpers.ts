/**
 * In-process stand-ins for walker tests
 */

import type { CommitVisitor, GitRepository, ReadLogResult, ReadRefsResult } from '../git/repository.js';
import type {
  Commit,
  GitGraphError,
  GitGraphResult,
  GitRef,
  ObjectId,
  RefKind,
  TreeEntry,
  TreeObject,
} from '../git/types.js';
import { err, ok, unsafeObjectId } from '../git/types.js';
import type { GraphEdge, GraphNode, GraphScope, GraphStore, Upload } from '../store/types.js';

/**
 * 40-char id from a short hex prefix
 */
export function oid(prefix: string): ObjectId {
  return unsafeObjectId(prefix.padEnd(40, '0'));
}

export function makeCommit(
  hash: ObjectId,
  parents: readonly ObjectId[],
  tree: ObjectId,
  message: string,
  authorDate: string = '2024-01-15T10:30:00+01:00'
): Commit {
  return {
    hash,
    parents,
    tree,
    author: { name: 'Test', email: 'test@example.com' },
    authorDate,
    message,
  };
}

export function fileEntry(name: string, hash: ObjectId, mode: string = '100644'): TreeEntry {
  return { mode, type: 'blob', hash, name };
}

export function dirEntry(name: string, hash: ObjectId): TreeEntry {
  return { mode: '040000', type: 'tree', hash, name };
}

export function makeRef(fullName: string, objectId: ObjectId): GitRef {
  const kinds: ReadonlyArray<readonly [string, RefKind]> = [
    ['refs/heads/', 'branch'],
    ['refs/tags/', 'tag'],
    ['refs/remotes/', 'remote'],
  ];
  const match = kinds.find(([prefix]) => fullName.startsWith(prefix));
  return {
    name: match ? fullName.slice(match[0].length) : fullName,
    fullName,
    objectId,
    kind: match ? match[1] : 'other',
  };
}

/**
 * In-memory object database
 */
export class FakeRepository implements GitRepository {
  readonly path = '/fake/repo';
  readonly refs: GitRef[] = [];
  readonly commits = new Map<ObjectId, Commit>();
  readonly trees = new Map<ObjectId, TreeObject>();
  refsError: GitGraphError | null = null;

  addCommit(commit: Commit): this {
    this.commits.set(commit.hash, commit);
    return this;
  }

  addTree(hash: ObjectId, entries: readonly TreeEntry[]): this {
    this.trees.set(hash, { hash, entries });
    return this;
  }

  addRef(fullName: string, target: ObjectId): this {
    this.refs.push(makeRef(fullName, target));
    return this;
  }

  async listRefs(): Promise<GitGraphResult<ReadRefsResult>> {
    if (this.refsError) {
      return err(this.refsError);
    }
    return ok({ refs: [...this.refs], warnings: [] });
  }

  /**
   * Reverse post-order from the tip: every child before its parents
   */
  async log(from: ObjectId, visit: CommitVisitor): Promise<GitGraphResult<ReadLogResult>> {
    if (!this.commits.has(from)) {
      return err({ type: 'command_failed', message: `bad revision ${from}`, exitCode: 128 });
    }

    const seen = new Set<ObjectId>();
    const postOrder: Commit[] = [];
    const collect = (hash: ObjectId): void => {
      const commit = this.commits.get(hash);
      if (!commit || seen.has(hash)) {
        return;
      }
      seen.add(hash);
      for (const parent of commit.parents) {
        collect(parent);
      }
      postOrder.push(commit);
    };
    collect(from);

    const commits = postOrder.reverse();
    for (const commit of commits) {
      const visited = await visit(commit);
      if (!visited.ok) {
        return visited;
      }
    }
    return ok({ commits: commits.length, warnings: [] });
  }

  async readTree(tree: ObjectId): Promise<GitGraphResult<TreeObject>> {
    const found = this.trees.get(tree);
    if (!found) {
      return err({ type: 'command_failed', message: `not a tree object: ${tree}`, exitCode: 128 });
    }
    return ok(found);
  }
}

export type WriteOperation = 'upsertAuthoritative' | 'insertIfAbsent' | 'appendEdge' | 'flush';

/**
 * Delegating store whose `operation` fails from the `failAt`-th call on
 */
export class FailingStore implements GraphStore {
  private calls = 0;

  constructor(
    private readonly inner: GraphStore,
    private readonly operation: WriteOperation,
    private readonly failAt: number = 1
  ) {}

  private shouldFail(operation: WriteOperation): boolean {
    if (operation !== this.operation) {
      return false;
    }
    this.calls++;
    return this.calls >= this.failAt;
  }

  private failure(): GitGraphResult<void> {
    return err({ type: 'store_failed', message: `Graph store ${this.operation} failed: disk full` });
  }

  async upsertAuthoritative(node: GraphNode): Promise<GitGraphResult<void>> {
    return this.shouldFail('upsertAuthoritative') ? this.failure() : this.inner.upsertAuthoritative(node);
  }

  async insertIfAbsent(node: GraphNode): Promise<GitGraphResult<void>> {
    return this.shouldFail('insertIfAbsent') ? this.failure() : this.inner.insertIfAbsent(node);
  }

  async appendEdge(edge: GraphEdge): Promise<GitGraphResult<void>> {
    return this.shouldFail('appendEdge') ? this.failure() : this.inner.appendEdge(edge);
  }

  listNodes(scope: GraphScope): Promise<GitGraphResult<GraphNode[]>> {
    return this.inner.listNodes(scope);
  }

  listEdges(scope: GraphScope): Promise<GitGraphResult<GraphEdge[]>> {
    return this.inner.listEdges(scope);
  }

  createUpload(name: string): Promise<GitGraphResult<Upload>> {
    return this.inner.createUpload(name);
  }

  getUpload(scope: GraphScope): Promise<GitGraphResult<Upload | null>> {
    return this.inner.getUpload(scope);
  }

  listUploads(): Promise<GitGraphResult<Upload[]>> {
    return this.inner.listUploads();
  }

  async flush(): Promise<GitGraphResult<void>> {
    return this.shouldFail('flush') ? this.failure() : this.inner.flush();
  }

  close(): Promise<GitGraphResult<void>> {
    return this.inner.close();
  }
}

/**
 * Unwrap a result in a test, failing loudly on error
 */
export function unwrap<T>(result: GitGraphResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.type}: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Count edges by "source rel target"
 */
export function edgeCounts(edges: readonly GraphEdge[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const edge of edges) {
    const key = `${edge.source} ${edge.relation} ${edge.target}`;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

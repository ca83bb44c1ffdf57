import { describe, it, expect, beforeEach } from 'vitest';
import { createTreeWalkStats, walkTree } from './tree-walker.js';
import type { TreeWalkContext } from './tree-walker.js';
import { GraphWriter } from './writer.js';
import { FakeRepository, dirEntry, fileEntry, oid, unwrap } from './test-helpers.js';
import { openGraphStore } from '../store/sql-graph-store.js';
import type { SqlGraphStore } from '../store/sql-graph-store.js';
import type { ObjectId, TreeObject } from '../git/types.js';
import { unsafeObjectId } from '../git/types.js';

const SCOPE = 7;

describe('walkTree', () => {
  let store: SqlGraphStore;
  let repo: FakeRepository;

  beforeEach(async () => {
    store = unwrap(await openGraphStore());
    repo = new FakeRepository();
    return async () => {
      await store.close();
    };
  });

  function context(): TreeWalkContext {
    return {
      repo,
      writer: new GraphWriter(store, SCOPE),
      warnings: [],
      stats: createTreeWalkStats(),
    };
  }

  function root(hash: ObjectId): TreeObject {
    const tree = repo.trees.get(hash);
    if (!tree) {
      throw new Error(`missing fixture ${hash}`);
    }
    return tree;
  }

  // edges abbreviated to the two-character fixture prefixes
  async function edgeList(): Promise<string[]> {
    return unwrap(await store.listEdges(SCOPE)).map(
      (e) => `${e.source.slice(0, 2)} ${e.relation} ${e.target.slice(0, 2)}`
    );
  }

  it('writes edges in depth-first pre-order', async () => {
    repo
      .addTree(oid('a0'), [dirEntry('a', oid('a1')), fileEntry('z.txt', oid('b3'))])
      .addTree(oid('a1'), [dirEntry('b', oid('a2')), fileEntry('y.txt', oid('b2'))])
      .addTree(oid('a2'), [fileEntry('x.txt', oid('b1'))]);

    unwrap(await walkTree(root(oid('a0')), context()));

    expect(await edgeList()).toEqual([
      'a0 tree->tree a1',
      'a1 tree->tree a2',
      'a2 tree->blob b1',
      'a1 tree->blob b2',
      'a0 tree->blob b3',
    ]);
  });

  it('labels trees and blobs with their entry names', async () => {
    repo
      .addTree(oid('a0'), [dirEntry('src', oid('a1'))])
      .addTree(oid('a1'), [fileEntry('main.ts', oid('b1'))]);

    unwrap(await walkTree(root(oid('a0')), context()));

    const nodes = unwrap(await store.listNodes(SCOPE));
    expect(nodes.map((n) => [n.type, n.label])).toEqual([
      ['tree', 'src'],
      ['blob', 'main.ts'],
    ]);
  });

  it('keeps the first label of a tree reached under two names', async () => {
    repo
      .addTree(oid('a0'), [dirEntry('one', oid('a1')), dirEntry('two', oid('a1'))])
      .addTree(oid('a1'), []);

    const ctx = context();
    unwrap(await walkTree(root(oid('a0')), ctx));

    const nodes = unwrap(await store.listNodes(SCOPE));
    expect(nodes).toHaveLength(1);
    expect(nodes[0]?.label).toBe('one');
    expect(await edgeList()).toEqual(['a0 tree->tree a1', 'a0 tree->tree a1']);
    expect(ctx.stats.treesVisited).toBe(3);
  });

  it('gives a blob the last name it was written under', async () => {
    repo.addTree(oid('a0'), [fileEntry('first.txt', oid('b1')), fileEntry('second.txt', oid('b1'))]);

    unwrap(await walkTree(root(oid('a0')), context()));

    const nodes = unwrap(await store.listNodes(SCOPE));
    expect(nodes.map((n) => n.label)).toEqual(['second.txt']);
  });

  it('treats executables and symlinks as blobs and ignores submodules', async () => {
    repo.addTree(oid('a0'), [
      fileEntry('run.sh', oid('b1'), '100755'),
      fileEntry('link', oid('b2'), '120000'),
      { mode: '160000', type: 'commit', hash: oid('c1'), name: 'vendor' },
    ]);

    const ctx = context();
    unwrap(await walkTree(root(oid('a0')), ctx));

    expect(await edgeList()).toEqual(['a0 tree->blob b1', 'a0 tree->blob b2']);
    expect(ctx.stats).toEqual({ treesVisited: 1, blobsVisited: 2, unresolvedTrees: 0 });
  });

  it('skips a subtree that cannot be read and carries on', async () => {
    repo.addTree(oid('a0'), [dirEntry('gone', oid('a9')), fileEntry('kept.txt', oid('b1'))]);

    const ctx = context();
    unwrap(await walkTree(root(oid('a0')), ctx));

    expect(await edgeList()).toEqual(['a0 tree->blob b1']);
    expect(ctx.stats.unresolvedTrees).toBe(1);
    expect(ctx.warnings).toEqual([
      `Skipped tree ${oid('a9')} (gone): not a tree object: ${oid('a9')}`,
    ]);
  });

  it('descends deep directory chains', async () => {
    const depth = 300;
    const hashes = Array.from({ length: depth + 1 }, (_, i) =>
      unsafeObjectId(`f${i.toString(16).padStart(39, '0')}`)
    );
    hashes.forEach((hash, i) => {
      const child = hashes[i + 1];
      repo.addTree(hash, child ? [dirEntry(`d${i}`, child)] : [fileEntry('leaf.txt', oid('b1'))]);
    });

    const ctx = context();
    unwrap(await walkTree(root(unsafeObjectId(`f${'0'.repeat(39)}`)), ctx));

    expect(ctx.stats.treesVisited).toBe(depth + 1);
    expect(ctx.stats.blobsVisited).toBe(1);
    expect(unwrap(await store.listEdges(SCOPE))).toHaveLength(depth + 1);
  });
});

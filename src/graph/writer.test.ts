import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import initSqlJs from 'sql.js';
import { GraphWriter } from './writer.js';
import { FailingStore, oid, unwrap } from './test-helpers.js';
import { openGraphStore } from '../store/sql-graph-store.js';
import type { SqlGraphStore } from '../store/sql-graph-store.js';

const meta = { author: 'Test', email: 'test@example.com', time: '2024-01-15T10:30:00+01:00' };

describe('GraphWriter', () => {
  let store: SqlGraphStore;

  beforeEach(async () => {
    store = unwrap(await openGraphStore());
    return async () => {
      await store.close();
    };
  });

  it('lets a visited commit overwrite its placeholder', async () => {
    const writer = new GraphWriter(store, 1);

    unwrap(await writer.placeholderCommit(oid('c1')));
    unwrap(await writer.commit(oid('c1'), 'init', meta));

    expect(unwrap(await store.listNodes(1))).toEqual([
      { id: oid('c1'), graphScope: 1, type: 'commit', label: 'init', metadata: meta },
    ]);
    expect(writer.stats).toEqual({ nodeWrites: 2, cachedNodeWrites: 0, edgeWrites: 0, flushes: 0 });
  });

  it('never lets a placeholder replace a visited commit', async () => {
    const writer = new GraphWriter(store, 1, { cacheNodeWrites: false });

    unwrap(await writer.commit(oid('c1'), 'init', meta));
    unwrap(await writer.placeholderCommit(oid('c1')));

    expect(unwrap(await store.listNodes(1))[0]?.label).toBe('init');
    expect(writer.stats.nodeWrites).toBe(2);
  });

  it('skips repeated node writes within a run', async () => {
    const writer = new GraphWriter(store, 1);

    unwrap(await writer.commit(oid('c1'), 'init', meta));
    unwrap(await writer.commit(oid('c1'), 'init', meta));
    unwrap(await writer.placeholderCommit(oid('c1')));
    unwrap(await writer.tree(oid('a1'), 'src'));
    unwrap(await writer.tree(oid('a1'), 'lib'));

    expect(writer.stats).toEqual({ nodeWrites: 2, cachedNodeWrites: 3, edgeWrites: 0, flushes: 0 });
    expect(unwrap(await store.listNodes(1)).map((n) => n.label)).toEqual(['init', 'src']);
  });

  it('always writes blobs so the last filename wins', async () => {
    const writer = new GraphWriter(store, 1);

    unwrap(await writer.blob(oid('b1'), 'a.txt'));
    unwrap(await writer.blob(oid('b1'), 'b.txt'));

    expect(writer.stats.nodeWrites).toBe(2);
    expect(unwrap(await store.listNodes(1))).toEqual([
      { id: oid('b1'), graphScope: 1, type: 'blob', label: 'b.txt', metadata: null },
    ]);
  });

  it('writes every edge', async () => {
    const writer = new GraphWriter(store, 1);

    unwrap(await writer.edge(oid('a1'), oid('b1'), 'tree->blob'));
    unwrap(await writer.edge(oid('a1'), oid('b1'), 'tree->blob'));

    expect(writer.stats.edgeWrites).toBe(2);
    expect(unwrap(await store.listEdges(1))).toHaveLength(2);
  });

  it('writes into its own scope only', async () => {
    unwrap(await new GraphWriter(store, 1).tree(oid('a1'), 'one'));
    unwrap(await new GraphWriter(store, 2).tree(oid('a1'), 'two'));

    expect(unwrap(await store.listNodes(1)).map((n) => n.label)).toEqual(['one']);
    expect(unwrap(await store.listNodes(2)).map((n) => n.label)).toEqual(['two']);
  });

  it('reports store failures as graph_incomplete', async () => {
    const writer = new GraphWriter(new FailingStore(store, 'insertIfAbsent'), 7);

    const result = await writer.tree(oid('a1'), 'src');

    expect(result).toEqual({
      ok: false,
      error: {
        type: 'graph_incomplete',
        message: 'Graph 7 is incomplete: Graph store insertIfAbsent failed: disk full',
      },
    });
    expect(writer.stats.nodeWrites).toBe(0);
  });

  it('flushes the store every flushEvery writes', async () => {
    const writer = new GraphWriter(store, 1, { flushEvery: 2 });

    unwrap(await writer.tree(oid('a1'), 'src'));
    unwrap(await writer.blob(oid('b1'), 'a.txt'));
    unwrap(await writer.edge(oid('a1'), oid('b1'), 'tree->blob'));

    expect(writer.stats).toEqual({ nodeWrites: 2, cachedNodeWrites: 0, edgeWrites: 1, flushes: 1 });
  });

  it('does not count cached writes towards a flush', async () => {
    const writer = new GraphWriter(store, 1, { flushEvery: 2 });

    unwrap(await writer.tree(oid('a1'), 'src'));
    unwrap(await writer.tree(oid('a1'), 'src'));

    expect(writer.stats.flushes).toBe(0);
  });

  it('never flushes when flushEvery is 0', async () => {
    const writer = new GraphWriter(new FailingStore(store, 'flush'), 1, { flushEvery: 0 });

    for (let i = 0; i < 5; i++) {
      unwrap(await writer.edge(oid('a1'), oid('b1'), 'tree->blob'));
    }

    expect(writer.stats.flushes).toBe(0);
  });

  it('reports a failed flush as graph_incomplete', async () => {
    const writer = new GraphWriter(new FailingStore(store, 'flush'), 3, { flushEvery: 2 });

    unwrap(await writer.tree(oid('a1'), 'src'));
    const result = await writer.tree(oid('a2'), 'lib');

    expect(result).toEqual({
      ok: false,
      error: {
        type: 'graph_incomplete',
        message: 'Graph 3 is incomplete: Graph store flush failed: disk full',
      },
    });
    expect(writer.stats).toEqual({ nodeWrites: 2, cachedNodeWrites: 0, edgeWrites: 0, flushes: 0 });
  });
});

describe('GraphWriter on a database file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gitgraph-writer-'));
    return async () => {
      await rm(dir, { recursive: true, force: true });
    };
  });

  it('saves writes to disk during the run', async () => {
    const path = join(dir, 'graph.db');
    const fileStore = unwrap(await openGraphStore({ path }));
    try {
      const writer = new GraphWriter(fileStore, 1, { flushEvery: 1 });
      await expect(stat(path)).rejects.toThrow();

      unwrap(await writer.tree(oid('a1'), 'src'));

      // Readable without the holder closing the store
      const SQL = await initSqlJs();
      const image = new SQL.Database(await readFile(path));
      try {
        expect(image.exec('SELECT id, label FROM nodes')[0]?.values).toEqual([[oid('a1'), 'src']]);
      } finally {
        image.close();
      }
    } finally {
      unwrap(await fileStore.close());
    }
  });
});

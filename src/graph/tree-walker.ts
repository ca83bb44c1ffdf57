/**
 * Tree walker
 *
 * Visits every entry below a tree object, writing blob and tree nodes and
 * the edges from each containing tree.
 */

import { isDirMode, isFileMode } from '../git/parser.js';
import type { GitRepository } from '../git/repository.js';
import type { GitGraphResult, TreeObject } from '../git/types.js';
import { ok } from '../git/types.js';
import type { GraphWriter } from './writer.js';

export interface TreeWalkStats {
  /** Trees whose entries were visited, the root included */
  treesVisited: number;
  blobsVisited: number;
  /** Subtrees that could not be read and were skipped */
  unresolvedTrees: number;
}

export interface TreeWalkContext {
  readonly repo: GitRepository;
  readonly writer: GraphWriter;
  readonly warnings: string[];
  readonly stats: TreeWalkStats;
}

export function createTreeWalkStats(): TreeWalkStats {
  return { treesVisited: 0, blobsVisited: 0, unresolvedTrees: 0 };
}

interface Frame {
  readonly tree: TreeObject;
  next: number;
}

/**
 * Walk `root` depth-first
 *
 * The node for `root` itself is the caller's to write. Writes happen in the
 * same order a recursive pre-order descent would make them, but an explicit
 * stack keeps call depth flat however deep the directories go. Trees are
 * content-addressed, so the walk cannot cycle.
 *
 * Returns an error only when a store write fails.
 */
export async function walkTree(root: TreeObject, ctx: TreeWalkContext): Promise<GitGraphResult<void>> {
  const { repo, writer, warnings, stats } = ctx;
  const stack: Frame[] = [{ tree: root, next: 0 }];
  stats.treesVisited++;

  for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
    const entry = frame.tree.entries[frame.next];
    if (!entry) {
      stack.pop();
      continue;
    }
    frame.next++;

    if (isFileMode(entry.mode)) {
      const node = await writer.blob(entry.hash, entry.name);
      if (!node.ok) return node;
      const edge = await writer.edge(frame.tree.hash, entry.hash, 'tree->blob');
      if (!edge.ok) return edge;
      stats.blobsVisited++;
      continue;
    }

    if (!isDirMode(entry.mode)) {
      // submodule links point into another repository
      continue;
    }

    const subtree = await repo.readTree(entry.hash);
    if (!subtree.ok) {
      stats.unresolvedTrees++;
      warnings.push(`Skipped tree ${entry.hash} (${entry.name}): ${subtree.error.message}`);
      continue;
    }

    const node = await writer.tree(entry.hash, entry.name);
    if (!node.ok) return node;
    const edge = await writer.edge(frame.tree.hash, entry.hash, 'tree->tree');
    if (!edge.ok) return edge;

    stats.treesVisited++;
    stack.push({ tree: subtree.value, next: 0 });
  }

  return ok(undefined);
}

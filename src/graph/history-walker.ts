/**
 * History walker
 *
 * Walks the ancestry of every branch and tag, writing commit nodes, parent
 * edges and each commit's root tree, and hands the root tree to the tree walker.
 */

import type { GitRepository } from '../git/repository.js';
import type { Commit, GitGraphResult, GitRef } from '../git/types.js';
import { ok } from '../git/types.js';
import type { TreeWalkStats } from './tree-walker.js';
import { createTreeWalkStats, walkTree } from './tree-walker.js';
import type { GraphWriter } from './writer.js';

/**
 * Label of every commit's root tree
 */
export const ROOT_TREE_LABEL = '/';

export interface HistoryStats extends TreeWalkStats {
  /** Branch and tag refs found */
  refsFound: number;
  /** Refs in other namespaces, not walked */
  refsIgnored: number;
  /** Refs whose history could not be read */
  refsSkipped: number;
  /** Commit visits, counting a commit once per ref that reaches it */
  commitVisits: number;
  /** Distinct commits visited */
  commitsVisited: number;
}

export interface HistoryWalkResult {
  readonly stats: HistoryStats;
  readonly warnings: readonly string[];
}

/**
 * Only branches and tags are traversal roots
 */
export function isTraversalRoot(ref: GitRef): boolean {
  return ref.kind === 'branch' || ref.kind === 'tag';
}

/**
 * Walk every branch and tag of `repo` into `writer`'s scope
 *
 * Commits are written as the log streams them. Fails when references cannot
 * be listed or a store write fails. A ref whose history cannot be read, or a
 * root tree that cannot be resolved, is skipped with a warning.
 */
export async function walkHistory(
  repo: GitRepository,
  writer: GraphWriter
): Promise<GitGraphResult<HistoryWalkResult>> {
  const warnings: string[] = [];
  const stats: HistoryStats = {
    refsFound: 0,
    refsIgnored: 0,
    refsSkipped: 0,
    commitVisits: 0,
    commitsVisited: 0,
    ...createTreeWalkStats(),
  };
  const visited = new Set<string>();

  const refsResult = await repo.listRefs();
  if (!refsResult.ok) {
    return refsResult;
  }
  warnings.push(...refsResult.value.warnings);

  for (const ref of refsResult.value.refs) {
    if (!isTraversalRoot(ref)) {
      stats.refsIgnored++;
      continue;
    }
    stats.refsFound++;

    const logResult = await repo.log(ref.objectId, (commit) => {
      stats.commitVisits++;
      if (!visited.has(commit.hash)) {
        visited.add(commit.hash);
        stats.commitsVisited++;
      }
      return visitCommit(repo, writer, commit, warnings, stats);
    });
    if (!logResult.ok) {
      // a failed store write ends the walk; a failed log only loses the rest of this ref
      if (logResult.error.type === 'graph_incomplete') {
        return logResult;
      }
      stats.refsSkipped++;
      warnings.push(`Skipped ${ref.fullName}: ${logResult.error.message}`);
      continue;
    }
    warnings.push(...logResult.value.warnings);
  }

  return ok({ stats, warnings });
}

async function visitCommit(
  repo: GitRepository,
  writer: GraphWriter,
  commit: Commit,
  warnings: string[],
  stats: HistoryStats
): Promise<GitGraphResult<void>> {
  const node = await writer.commit(commit.hash, commit.message.trim(), {
    author: commit.author.name,
    email: commit.author.email,
    time: commit.authorDate,
  });
  if (!node.ok) return node;

  for (const parent of commit.parents) {
    const placeholder = await writer.placeholderCommit(parent);
    if (!placeholder.ok) return placeholder;
    const edge = await writer.edge(commit.hash, parent, 'parent');
    if (!edge.ok) return edge;
  }

  const tree = await repo.readTree(commit.tree);
  if (!tree.ok) {
    stats.unresolvedTrees++;
    warnings.push(`Skipped root tree of ${commit.hash}: ${tree.error.message}`);
    return ok(undefined);
  }

  const treeNode = await writer.tree(commit.tree, ROOT_TREE_LABEL);
  if (!treeNode.ok) return treeNode;
  const edge = await writer.edge(commit.hash, commit.tree, 'commit->tree');
  if (!edge.ok) return edge;

  return walkTree(tree.value, { repo, writer, warnings, stats });
}

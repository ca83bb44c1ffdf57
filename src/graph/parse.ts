/**
 * Parse pipeline
 *
 * Locates the repository inside an extracted directory, opens it and walks
 * its history into one graph scope. Writes are committed as they happen:
 * a parse that fails midway leaves a partial but readable scope.
 */

import type { GitExecutor } from '../git/executor.js';
import type { LocatedRepository } from '../git/locator.js';
import { locateRepository } from '../git/locator.js';
import { openRepository } from '../git/repository.js';
import type { GitGraphResult } from '../git/types.js';
import { err, ok } from '../git/types.js';
import type { GraphScope, GraphStore } from '../store/types.js';
import type { HistoryStats } from './history-walker.js';
import { walkHistory } from './history-walker.js';
import type { GraphWriterOptions, WriteStats } from './writer.js';
import { GraphWriter } from './writer.js';

export interface ParseDependencies {
  readonly executor: GitExecutor;
  readonly store: GraphStore;
}

export type ParseOptions = GraphWriterOptions;

export type ParseStats = HistoryStats & WriteStats;

export interface ParseSummary {
  readonly scope: GraphScope;
  readonly repository: LocatedRepository;
  readonly stats: ParseStats;
  /** Non-fatal problems: skipped refs, unresolved trees, unparsable records */
  readonly warnings: readonly string[];
  readonly durationMs: number;
}

/**
 * Parse the repository found under `root` into `scope`
 *
 * Fails when no repository can be opened, when references cannot be listed,
 * and (as `graph_incomplete`) when any store write fails.
 */
export async function parse(
  root: string,
  scope: GraphScope,
  deps: ParseDependencies,
  options: ParseOptions = {}
): Promise<GitGraphResult<ParseSummary>> {
  const startTime = Date.now();

  const repository = await locateRepository(root);

  const repoResult = await openRepository(deps.executor, repository.path);
  if (!repoResult.ok) {
    const { error } = repoResult;
    return err({
      ...error,
      message:
        error.type === 'not_a_repo'
          ? `No git repository found under ${root} (tried ${repository.path})`
          : error.message,
    });
  }

  const writer = new GraphWriter(deps.store, scope, options);
  const walkResult = await walkHistory(repoResult.value, writer);
  if (!walkResult.ok) {
    return walkResult;
  }

  const flushResult = await deps.store.flush();
  if (!flushResult.ok) {
    return err({
      type: 'graph_incomplete',
      message: `Graph ${scope} is incomplete: ${flushResult.error.message}`,
    });
  }

  return ok({
    scope,
    repository,
    stats: { ...walkResult.value.stats, ...writer.stats },
    warnings: walkResult.value.warnings,
    durationMs: Date.now() - startTime,
  });
}

/**
 * Repository access
 *
 * The repository-open operation and the object reads the walkers need,
 * built on top of the executor and the pure parsers.
 */

import type {
  Commit,
  ExecuteOptions,
  GitGraphError,
  GitGraphResult,
  GitRef,
  ObjectId,
  RawGitOutput,
  TreeObject,
} from './types.js';
import { err, ok } from './types.js';
import type { GitExecutor, ProcessOutput } from './executor.js';
import { GitCommands } from './executor.js';
import { LOG_RECORD_SEPARATOR, parseCommits, parseRefs, parseTreeEntries } from './parser.js';

/**
 * Read side of an opened repository
 *
 * The walkers depend on this interface only, so tests can substitute
 * an in-memory object database.
 */
export interface GitRepository {
  /** Path the repository was opened at */
  readonly path: string;

  /** Every reference in every namespace */
  listRefs(): Promise<GitGraphResult<ReadRefsResult>>;

  /**
   * Ancestry of a tip, each child before its parents
   *
   * Commits are handed to `visit` one at a time as git produces them. The
   * first failed visit stops the log and becomes its result.
   */
  log(from: ObjectId, visit: CommitVisitor): Promise<GitGraphResult<ReadLogResult>>;

  /** Entries of one tree object */
  readTree(tree: ObjectId): Promise<GitGraphResult<TreeObject>>;
}

/**
 * Refs plus non-fatal parse warnings
 */
export interface ReadRefsResult {
  readonly refs: readonly GitRef[];
  readonly warnings: readonly string[];
}

export type CommitVisitor = (commit: Commit) => Promise<GitGraphResult<void>>;

/**
 * Number of commits visited plus non-fatal parse warnings
 */
export interface ReadLogResult {
  readonly commits: number;
  readonly warnings: readonly string[];
}

/**
 * Open a repository at `path` (a working copy, its `.git` directory, or a bare repository)
 *
 * Fails with `not_a_repo` when git does not recognise the path.
 */
export async function openRepository(
  executor: GitExecutor,
  path: string
): Promise<GitGraphResult<GitRepository>> {
  const verifyResult = await executor.execute(GitCommands.verifyRepo(), { cwd: path });
  if (!verifyResult.ok) {
    return err(verifyResult.error);
  }
  if (verifyResult.value.exitCode !== 0) {
    return err({
      type: 'not_a_repo',
      message: `Not a git repository: ${path}`,
      stderr: verifyResult.value.stderr,
      exitCode: verifyResult.value.exitCode,
    });
  }

  return ok(new CliRepository(executor, path));
}

class CliRepository implements GitRepository {
  private readonly execOptions: ExecuteOptions;

  constructor(
    private readonly executor: GitExecutor,
    readonly path: string
  ) {
    this.execOptions = { cwd: path };
  }

  async listRefs(): Promise<GitGraphResult<ReadRefsResult>> {
    const result = await this.run(GitCommands.refs(), 'Failed to list references');
    if (!result.ok) {
      return result;
    }

    const { refs, errors } = parseRefs(result.value.stdout);
    return ok({
      refs,
      warnings: errors.map((e) => `Ref parse error: ${e.message}`),
    });
  }

  async log(from: ObjectId, visit: CommitVisitor): Promise<GitGraphResult<ReadLogResult>> {
    const warnings: string[] = [];
    let commits = 0;

    const args = GitCommands.log(from);
    const result = await this.executor.stream(args, this.execOptions, LOG_RECORD_SEPARATOR, async (record) => {
      const parsed = parseCommits(record);
      warnings.push(...parsed.errors.map((e) => `Commit parse error: ${e.message}`));
      for (const commit of parsed.commits) {
        commits++;
        const visited = await visit(commit);
        if (!visited.ok) {
          return visited;
        }
      }
      return ok(undefined);
    });
    if (!result.ok) {
      return result;
    }
    if (result.value.exitCode !== 0) {
      return err(commandFailed(`Failed to read history of ${from}`, args, result.value));
    }

    return ok({ commits, warnings });
  }

  async readTree(tree: ObjectId): Promise<GitGraphResult<TreeObject>> {
    const result = await this.run(GitCommands.lsTree(tree), `Failed to read tree ${tree}`);
    if (!result.ok) {
      return result;
    }

    const { entries, errors } = parseTreeEntries(result.value.stdout);
    const first = errors[0];
    if (first) {
      return err({
        type: 'parse_error',
        message: `Malformed tree ${tree}: ${first.message}`,
      });
    }

    return ok({ hash: tree, entries });
  }

  /**
   * Execute and treat a non-zero exit as a failure
   */
  private async run(
    args: readonly string[],
    failureMessage: string
  ): Promise<GitGraphResult<RawGitOutput>> {
    const result = await this.executor.execute(args, this.execOptions);
    if (!result.ok) {
      return result;
    }
    if (result.value.exitCode !== 0) {
      return err(commandFailed(failureMessage, args, result.value));
    }
    return result;
  }
}

function commandFailed(message: string, args: readonly string[], output: ProcessOutput): GitGraphError {
  return {
    type: 'command_failed',
    message,
    command: output.command,
    args,
    stderr: output.stderr,
    exitCode: output.exitCode,
  };
}

import { describe, it, expect, beforeAll } from 'vitest';
import { execSync } from 'node:child_process';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createGitExecutor } from './executor.js';
import type { GitExecutor, ProcessOutput } from './executor.js';
import { openRepository } from './repository.js';
import type { CommitVisitor, GitRepository } from './repository.js';
import type { Commit, ExecuteOptions, GitGraphResult, RawGitOutput } from './types.js';
import { err, ok, unsafeObjectId } from './types.js';

function unwrap<T>(result: GitGraphResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.type}: ${result.error.message}`);
  }
  return result.value;
}

function collect(into: Commit[]): CommitVisitor {
  return async (commit) => {
    into.push(commit);
    return ok(undefined);
  };
}

describe('openRepository', () => {
  const executor = createGitExecutor();
  let workspace: string;
  let repoPath: string;
  let repo: GitRepository;
  let head: string;
  let rootTree: string;
  let blob: string;

  beforeAll(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'gitgraph-repo-'));
    repoPath = join(workspace, 'repo');
    await mkdir(join(repoPath, 'src'), { recursive: true });

    const env = {
      ...process.env,
      HOME: workspace,
      GIT_AUTHOR_NAME: 'Alice',
      GIT_AUTHOR_EMAIL: 'alice@example.com',
      GIT_AUTHOR_DATE: '2024-01-15T10:30:00+02:00',
      GIT_COMMITTER_NAME: 'Alice',
      GIT_COMMITTER_EMAIL: 'alice@example.com',
    };
    const git = (command: string): string =>
      execSync(`git ${command}`, { cwd: repoPath, env }).toString().trim();

    git('init -q');
    git('symbolic-ref HEAD refs/heads/main');
    await writeFile(join(repoPath, 'README.md'), '# demo\n');
    await writeFile(join(repoPath, 'src', 'index.ts'), 'export {};\n');
    git('add .');
    git('commit -q -m "Initial commit" -m "Second paragraph"');
    git('tag v1');
    git('commit -q --allow-empty -m "Empty follow-up"');
    head = git('rev-parse HEAD');
    rootTree = git('rev-parse HEAD^{tree}');
    blob = git('rev-parse HEAD:README.md');

    repo = unwrap(await openRepository(executor, join(repoPath, '.git')));

    return async () => {
      await rm(workspace, { recursive: true, force: true });
    };
  });

  it('fails with not_a_repo outside a repository', async () => {
    const result = await openRepository(executor, workspace);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('not_a_repo');
      expect(result.error.message).toBe(`Not a git repository: ${workspace}`);
    }
  });

  it('lists refs in every namespace', async () => {
    const { refs, warnings } = unwrap(await repo.listRefs());

    expect(warnings).toEqual([]);
    expect(refs.map((r) => r.fullName)).toEqual(['refs/heads/main', 'refs/tags/v1']);
    expect(refs[0]?.objectId).toBe(head);
  });

  it('reads the history of a tip, newest first', async () => {
    const commits: Commit[] = [];
    const { commits: count, warnings } = unwrap(await repo.log(unsafeObjectId(head), collect(commits)));

    expect(warnings).toEqual([]);
    expect(count).toBe(2);
    expect(commits.map((c) => c.message)).toEqual(['Empty follow-up\n', 'Initial commit\n\nSecond paragraph\n']);
    expect(commits[0]?.parents).toEqual([commits[1]?.hash]);
    expect(commits[0]?.tree).toBe(rootTree);
    expect(commits[1]?.author).toEqual({ name: 'Alice', email: 'alice@example.com' });
    expect(commits[1]?.authorDate).toBe('2024-01-15T10:30:00+02:00');
  });

  it('stops reading history at the first failed visit', async () => {
    const seen: string[] = [];
    const result = await repo.log(unsafeObjectId(head), async (commit) => {
      seen.push(commit.message);
      return err({ type: 'graph_incomplete', message: 'Graph 1 is incomplete: disk full' });
    });

    expect(result).toEqual({ ok: false, error: { type: 'graph_incomplete', message: 'Graph 1 is incomplete: disk full' } });
    expect(seen).toEqual(['Empty follow-up\n']);
  });

  it('reads one tree level', async () => {
    const tree = unwrap(await repo.readTree(unsafeObjectId(rootTree)));

    expect(tree.hash).toBe(rootTree);
    expect(tree.entries.map((e) => [e.mode, e.type, e.name])).toEqual([
      ['100644', 'blob', 'README.md'],
      ['040000', 'tree', 'src'],
    ]);
    expect(tree.entries[0]?.hash).toBe(blob);
  });

  it('fails to read a tree that is not a tree', async () => {
    const result = await repo.readTree(unsafeObjectId(blob));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('command_failed');
      expect(result.error.message).toBe(`Failed to read tree ${blob}`);
      expect(result.error.exitCode).not.toBe(0);
    }
  });

  it('fails to read the history of an unknown commit', async () => {
    const missing = 'e'.repeat(40);
    const result = await repo.log(unsafeObjectId(missing), collect([]));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('command_failed');
      expect(result.error.message).toBe(`Failed to read history of ${missing}`);
    }
  });
});

describe('CLI repository output handling', () => {
  /**
   * Executor that answers every command with canned stdout
   */
  function cannedExecutor(stdout: Record<string, string>): GitExecutor {
    return {
      async execute(args: readonly string[], options: ExecuteOptions): Promise<GitGraphResult<RawGitOutput>> {
        const command = args[0] ?? '';
        return ok({
          stdout: stdout[command] ?? '',
          stderr: '',
          exitCode: 0,
          command: 'git',
          args: [...args, options.cwd],
          durationMs: 0,
        });
      },
      async stream(args, options, separator, onRecord): Promise<GitGraphResult<ProcessOutput>> {
        const command = args[0] ?? '';
        for (const record of (stdout[command] ?? '').split(separator)) {
          const handled = await onRecord(record);
          if (!handled.ok) {
            return handled;
          }
        }
        return ok({ stderr: '', exitCode: 0, command: 'git', args: [...args, options.cwd], durationMs: 0 });
      },
      async isGitAvailable() {
        return true;
      },
      async isRepository() {
        return true;
      },
    };
  }

  it('turns unparsable refs into warnings', async () => {
    const repo = unwrap(
      await openRepository(
        cannedExecutor({ 'rev-parse': '.git\n', 'for-each-ref': `nothex refs/heads/main commit\n${'a'.repeat(40)} refs/heads/dev commit\n` }),
        '/repo'
      )
    );

    const { refs, warnings } = unwrap(await repo.listRefs());

    expect(refs.map((r) => r.name)).toEqual(['dev']);
    expect(warnings).toEqual(['Ref parse error: Invalid ref hash: nothex']);
  });

  it('turns unparsable commit records into warnings', async () => {
    const hash = 'a'.repeat(40);
    const tree = 'f'.repeat(40);
    const log = `bad\x00record\x01\n${hash}\x00\x00${tree}\x00Alice\x00alice@example.com\x002024-01-15T10:30:00+00:00\x00good\n\x01\n`;
    const repo = unwrap(await openRepository(cannedExecutor({ 'rev-parse': '.git\n', log }), '/repo'));

    const commits: Commit[] = [];
    const result = unwrap(await repo.log(unsafeObjectId(hash), collect(commits)));

    expect(result).toEqual({ commits: 1, warnings: ['Commit parse error: Expected 7 fields, got 2'] });
    expect(commits.map((c) => [c.hash, c.message])).toEqual([[hash, 'good\n']]);
  });

  it('rejects a tree listing with malformed entries', async () => {
    const repo = unwrap(
      await openRepository(cannedExecutor({ 'rev-parse': '.git\n', 'ls-tree': '100644 blob short\tfile\x00' }), '/repo')
    );
    const tree = 'c'.repeat(40);

    const result = await repo.readTree(unsafeObjectId(tree));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('parse_error');
      expect(result.error.message).toBe(`Malformed tree ${tree}: Invalid entry hash: short`);
    }
  });
});

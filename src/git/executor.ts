/**
 * Safe Git command executor
 *
 * This module provides a sandboxed interface for executing Git commands.
 * Only the read-only plumbing the object graph extraction needs is allowlisted.
 */

import { spawn } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';
import type {
  ExecuteOptions,
  GitGraphError,
  GitGraphResult,
  ObjectId,
  RawGitOutput,
} from './types.js';
import { err, ok } from './types.js';

// ============================================
// COMMAND SAFETY
// ============================================

/**
 * Allowlist of safe Git subcommands
 * None of these can modify repository state
 */
const SAFE_SUBCOMMANDS = new Set([
  // Repository inspection
  'rev-parse',

  // Refs and history
  'for-each-ref',
  'log',

  // Object inspection
  'ls-tree',
]);

/**
 * Flag prefixes that write files or run external programs
 */
const DANGEROUS_FLAG_PREFIXES = [
  '--output',
  '--ext-diff',
  '--textconv',
  '--filters',
  '--exec',
  '--upload-pack',
];

/**
 * Validate that a command is safe to execute
 * Throws if command is not allowlisted
 */
function validateCommand(args: readonly string[]): void {
  if (args.length === 0) {
    throw new GitExecutorError('unsafe_command', 'Empty command');
  }

  const subcommand = args[0];
  if (!subcommand || !SAFE_SUBCOMMANDS.has(subcommand)) {
    throw new GitExecutorError(
      'unsafe_command',
      `Git subcommand not allowlisted: ${subcommand}`,
      { args }
    );
  }

  for (const arg of args) {
    if (DANGEROUS_FLAG_PREFIXES.some((prefix) => arg.startsWith(prefix))) {
      throw new GitExecutorError(
        'unsafe_command',
        `Dangerous flag not allowed: ${arg}`,
        { args }
      );
    }
  }
}

// ============================================
// ERROR HANDLING
// ============================================

/**
 * Custom error class for Git executor errors
 */
export class GitExecutorError extends Error {
  readonly type: GitGraphError['type'];
  readonly command?: string;
  readonly args?: readonly string[];
  readonly stderr?: string;
  readonly exitCode?: number;

  constructor(
    type: GitGraphError['type'],
    message: string,
    details?: {
      command?: string;
      args?: readonly string[];
      stderr?: string;
      exitCode?: number;
    }
  ) {
    super(message);
    this.name = 'GitExecutorError';
    this.type = type;
    this.command = details?.command;
    this.args = details?.args;
    this.stderr = details?.stderr;
    this.exitCode = details?.exitCode;
  }

  toGitError(): GitGraphError {
    return {
      type: this.type,
      message: this.message,
      command: this.command,
      args: this.args,
      stderr: this.stderr,
      exitCode: this.exitCode,
    };
  }
}

// ============================================
// EXECUTOR IMPLEMENTATION
// ============================================

/**
 * Receives one separator-delimited record of a streamed command's stdout
 * An error result stops the command.
 */
export type RecordHandler = (record: string) => Promise<GitGraphResult<void>>;

/**
 * Everything about a finished command except its stdout
 */
export type ProcessOutput = Omit<RawGitOutput, 'stdout'>;

/**
 * Interface for the Git executor
 */
export interface GitExecutor {
  /**
   * Execute a git command and return raw output
   * Only safe, read-only commands are allowed
   */
  execute(args: readonly string[], options: ExecuteOptions): Promise<GitGraphResult<RawGitOutput>>;

  /**
   * Execute a git command and hand its stdout to `onRecord` one record at a time
   *
   * Records are split on `separator` and delivered in order; git is paused
   * while a record is being handled. Output is never buffered whole, so the
   * executor's output cap does not apply. Any text after the last separator
   * is delivered as a final record.
   */
  stream(
    args: readonly string[],
    options: ExecuteOptions,
    separator: string,
    onRecord: RecordHandler
  ): Promise<GitGraphResult<ProcessOutput>>;

  /**
   * Check if git is available on the system
   */
  isGitAvailable(): Promise<boolean>;

  /**
   * Verify a path is a git repository (or a git directory)
   */
  isRepository(path: string): Promise<boolean>;
}

/**
 * Options for creating an executor
 */
export interface GitExecutorOptions {
  /** Path to the git binary (default: `git` on PATH) */
  readonly gitPath?: string;
  /** Kill commands running longer than this many ms (default: no limit) */
  readonly timeout?: number;
  /** Fail `execute` once stdout exceeds this many bytes (default: no limit) */
  readonly maxOutputSize?: number;
}

/**
 * Create a new GitExecutor instance
 */
export function createGitExecutor(options: GitExecutorOptions = {}): GitExecutor {
  return new GitExecutorImpl(options.gitPath ?? 'git', options.timeout, options.maxOutputSize);
}

/**
 * Consumes one stdout chunk; an error stops the command
 */
type ChunkHandler = (chunk: Buffer) => Promise<GitGraphError | null>;

/**
 * Grace period between SIGTERM and SIGKILL
 */
const KILL_GRACE_MS = 5000;

/**
 * stderr kept for error reports (1MB); the rest is dropped
 */
const MAX_STDERR_SIZE = 1024 * 1024;

class GitExecutorImpl implements GitExecutor {
  private gitAvailable: boolean | null = null;

  constructor(
    private readonly gitPath: string,
    private readonly defaultTimeout: number | undefined,
    private readonly maxOutputSize: number | undefined
  ) {}

  async execute(args: readonly string[], options: ExecuteOptions): Promise<GitGraphResult<RawGitOutput>> {
    const limit = this.maxOutputSize;
    const chunks: Buffer[] = [];
    let size = 0;

    const result = await this.spawnGit(args, options, async (chunk) => {
      size += chunk.length;
      if (limit !== undefined && size > limit) {
        return {
          type: 'command_failed',
          message: `Git output exceeded maximum size (${limit} bytes)`,
          command: this.gitPath,
          args,
        };
      }
      chunks.push(chunk);
      return null;
    });
    if (!result.ok) {
      return result;
    }

    return ok({ ...result.value, stdout: Buffer.concat(chunks).toString('utf-8') });
  }

  async stream(
    args: readonly string[],
    options: ExecuteOptions,
    separator: string,
    onRecord: RecordHandler
  ): Promise<GitGraphResult<ProcessOutput>> {
    const decoder = new StringDecoder('utf8');
    let buffered = '';

    const deliver = async (text: string): Promise<GitGraphError | null> => {
      const records = text.split(separator);
      buffered = records.pop() ?? '';
      for (const record of records) {
        const handled = await onRecord(record);
        if (!handled.ok) {
          return handled.error;
        }
      }
      return null;
    };

    const result = await this.spawnGit(args, options, (chunk) => deliver(buffered + decoder.write(chunk)));
    if (!result.ok) {
      return result;
    }

    const tail = buffered + decoder.end();
    if (tail.length > 0) {
      const handled = await onRecord(tail);
      if (!handled.ok) {
        return handled;
      }
    }
    return result;
  }

  async isGitAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      const child = spawn(this.gitPath, ['--version'], {
        stdio: ['ignore', 'pipe', 'ignore'],
      });

      child.on('error', () => resolve(false));
      child.on('close', (code) => resolve(code === 0));
    });
  }

  async isRepository(path: string): Promise<boolean> {
    const result = await this.execute(GitCommands.verifyRepo(), { cwd: path });
    return result.ok && result.value.exitCode === 0;
  }

  /**
   * Validate the command and make sure git can be run at all
   */
  private async checkCommand(args: readonly string[]): Promise<GitGraphResult<void>> {
    try {
      validateCommand(args);
    } catch (e) {
      if (e instanceof GitExecutorError) {
        return err(e.toGitError());
      }
      throw e;
    }

    // Check git availability on first call
    if (this.gitAvailable === null) {
      this.gitAvailable = await this.isGitAvailable();
    }

    if (!this.gitAvailable) {
      return err({
        type: 'git_not_found',
        message: `Git executable not found: ${this.gitPath}`,
      });
    }
    return ok(undefined);
  }

  /**
   * Run git, feeding stdout chunks to `onChunk` strictly one after another
   *
   * The first error (from `onChunk` or the timeout) kills the process and
   * becomes the result; a non-zero exit is left for the caller to judge.
   */
  private async spawnGit(
    args: readonly string[],
    options: ExecuteOptions,
    onChunk: ChunkHandler
  ): Promise<GitGraphResult<ProcessOutput>> {
    const checked = await this.checkCommand(args);
    if (!checked.ok) {
      return checked;
    }

    const timeout = options.timeout ?? this.defaultTimeout;
    const startTime = Date.now();

    return new Promise((resolve) => {
      const stderrChunks: Buffer[] = [];
      let stderrSize = 0;
      let stopped: GitGraphError | null = null;
      let pending: Promise<void> = Promise.resolve();

      const child = spawn(this.gitPath, [...args], {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        // Don't inherit environment to avoid leaking sensitive data
        env: {
          PATH: process.env['PATH'],
          HOME: process.env['HOME'],
          GIT_TERMINAL_PROMPT: '0',
          // Never consult the system or global config of the host
          GIT_CONFIG_NOSYSTEM: '1',
          LANG: 'C',
          LC_ALL: 'C',
        },
      });

      const stop = (error: GitGraphError): void => {
        if (stopped) {
          return;
        }
        stopped = error;
        child.kill('SIGTERM');
        setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS).unref();
      };

      const timeoutId =
        timeout === undefined
          ? undefined
          : setTimeout(() => {
              stop({
                type: 'timeout',
                message: `Git command timed out after ${timeout}ms`,
                command: this.gitPath,
                args,
              });
            }, timeout);

      child.stdout.on('data', (chunk: Buffer) => {
        if (stopped) {
          return;
        }
        child.stdout.pause();
        pending = pending
          .then(async () => {
            if (stopped) {
              return;
            }
            const failure = await onChunk(chunk);
            if (failure) {
              stop(failure);
            }
          })
          .catch((error: unknown) => {
            stop({
              type: 'command_failed',
              message: `Failed to process git output: ${error instanceof Error ? error.message : String(error)}`,
              command: this.gitPath,
              args,
            });
          })
          .finally(() => child.stdout.resume());
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrSize += chunk.length;
        if (stderrSize <= MAX_STDERR_SIZE) {
          stderrChunks.push(chunk);
        }
      });

      child.on('error', (error) => {
        clearTimeout(timeoutId);
        resolve(
          err({
            type: 'command_failed',
            message: `Failed to spawn git: ${error.message}`,
            command: this.gitPath,
            args,
          })
        );
      });

      child.on('close', (code, signal) => {
        clearTimeout(timeoutId);

        const settle = (): void => {
          if (stopped) {
            resolve(err(stopped));
            return;
          }
          // Return raw output - let caller decide if exitCode !== 0 is an error
          resolve(
            ok({
              stderr: Buffer.concat(stderrChunks).toString('utf-8'),
              exitCode: code ?? (signal ? 128 : 1),
              command: this.gitPath,
              args,
              durationMs: Date.now() - startTime,
            })
          );
        };
        void pending.then(settle);
      });
    });
  }
}

// ============================================
// PREDEFINED COMMAND BUILDERS
// ============================================

/**
 * `git log` format: hash, parents, tree, author name, author email, author date, raw message
 * %x00 separates fields, %x01 terminates records
 */
export const LOG_FORMAT = '--format=%H%x00%P%x00%T%x00%an%x00%ae%x00%aI%x00%B%x01';

/**
 * Common Git command configurations
 * These ensure consistent, well-formed commands
 */
export const GitCommands = {
  /**
   * Ancestry of a single tip, children before parents
   */
  log(from: string): readonly string[] {
    return ['log', LOG_FORMAT, '--topo-order', '--no-color', from, '--'];
  },

  /**
   * Every ref in the repository, whatever its namespace
   * Namespace filtering happens after parsing
   */
  refs(): readonly string[] {
    return ['for-each-ref', '--format=%(objectname) %(refname)'];
  },

  /**
   * Verify path is a git repository
   */
  verifyRepo(): readonly string[] {
    return ['rev-parse', '--git-dir'];
  },

  /**
   * Entries of one tree object, NUL-terminated, not recursive
   */
  lsTree(tree: ObjectId): readonly string[] {
    return ['ls-tree', '-z', tree];
  },
} as const;

/**
 * Core Git data types for git-object-graph
 * These types describe the raw object model read from a repository
 */

// ============================================
// BRANDED TYPES
// ============================================

/**
 * Content-addressed object identifier (full 40-char SHA)
 * Branded type prevents accidental string mixing
 */
export type ObjectId = string & { readonly __brand: 'ObjectId' };

/**
 * Create an ObjectId without validation (use when source is trusted)
 */
export function unsafeObjectId(value: string): ObjectId {
  return value.trim().toLowerCase() as ObjectId;
}

// ============================================
// GIT ENTITIES
// ============================================

/**
 * Author identity
 */
export interface GitIdentity {
  readonly name: string;
  readonly email: string;
}

/**
 * A commit as read from `git log`
 * Immutable after parsing
 */
export interface Commit {
  readonly hash: ObjectId;
  readonly parents: readonly ObjectId[];
  /** Root tree of the snapshot */
  readonly tree: ObjectId;
  readonly author: GitIdentity;
  /** Author date in strict ISO 8601, with the author's own offset, as git prints it */
  readonly authorDate: string;
  /** Raw message, untrimmed */
  readonly message: string;
}

/**
 * Namespace a reference lives in
 */
export type RefKind = 'branch' | 'tag' | 'remote' | 'other';

/**
 * A Git reference
 * `objectId` is whatever the ref points at (an annotated tag points at a tag object)
 */
export interface GitRef {
  readonly name: string;
  readonly fullName: string;
  readonly objectId: ObjectId;
  readonly kind: RefKind;
}

/**
 * Object kinds that can appear as tree entries
 */
export type TreeEntryType = 'blob' | 'tree' | 'commit';

/**
 * A single row of a tree object
 */
export interface TreeEntry {
  /** Octal mode string as git prints it, e.g. `100644` or `040000` */
  readonly mode: string;
  readonly type: TreeEntryType;
  readonly hash: ObjectId;
  readonly name: string;
}

/**
 * A resolved tree object
 */
export interface TreeObject {
  readonly hash: ObjectId;
  readonly entries: readonly TreeEntry[];
}

// ============================================
// COMMAND EXECUTION TYPES
// ============================================

/**
 * Raw output from git commands before parsing
 */
export interface RawGitOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly command: string;
  readonly args: readonly string[];
  readonly durationMs: number;
}

/**
 * Error categories shared by the git layer, the walkers and the store
 */
export type GitGraphErrorType =
  | 'not_a_repo'
  | 'command_failed'
  | 'parse_error'
  | 'timeout'
  | 'unsafe_command'
  | 'git_not_found'
  | 'graph_incomplete'
  | 'store_failed';

/**
 * Structured error
 */
export interface GitGraphError {
  readonly type: GitGraphErrorType;
  readonly message: string;
  readonly command?: string;
  readonly args?: readonly string[];
  readonly stderr?: string;
  readonly exitCode?: number;
}

/**
 * Result type for git, store and pipeline operations
 */
export type GitGraphResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: GitGraphError };

/**
 * Helper to create success result
 */
export function ok<T>(value: T): GitGraphResult<T> {
  return { ok: true, value };
}

/**
 * Helper to create error result
 */
export function err<T>(error: GitGraphError): GitGraphResult<T> {
  return { ok: false, error };
}

// ============================================
// CONFIGURATION
// ============================================

/**
 * Options for command execution
 */
export interface ExecuteOptions {
  readonly cwd: string;
  readonly timeout?: number;
}

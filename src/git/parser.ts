/**
 * Git output parsers
 *
 * Transforms raw git command output into typed data structures.
 * All parsers are pure functions with no side effects.
 */

import type {
  Commit,
  GitRef,
  ObjectId,
  RefKind,
  TreeEntry,
  TreeEntryType,
} from './types.js';
import { unsafeObjectId } from './types.js';

// ============================================
// COMMIT PARSING
// ============================================

/**
 * Field separator in git log format (NULL byte)
 */
const FIELD_SEPARATOR = '\x00';

/**
 * Record separator in git log format
 */
export const LOG_RECORD_SEPARATOR = '\x01';

/**
 * Number of fields per commit record
 * hash, parents, tree, author name, author email, author date, message
 */
const EXPECTED_FIELDS = 7;

/**
 * Result of parsing commits
 */
export interface ParseCommitsResult {
  readonly commits: Commit[];
  readonly errors: ParseError[];
}

/**
 * A parsing error with context
 */
export interface ParseError {
  readonly type: 'malformed_record' | 'invalid_hash' | 'invalid_date' | 'invalid_mode';
  readonly message: string;
  readonly record?: string;
  readonly field?: string;
}

/**
 * Parse git log output into Commit objects
 *
 * Expects output from:
 * git log --format=%H%x00%P%x00%T%x00%an%x00%ae%x00%aI%x00%B%x01
 *
 * @param raw - Raw stdout from git log command
 * @returns Parsed commits and any errors encountered
 */
export function parseCommits(raw: string): ParseCommitsResult {
  const commits: Commit[] = [];
  const errors: ParseError[] = [];

  if (!raw || raw.trim().length === 0) {
    return { commits, errors };
  }

  // git terminates every formatted record with a newline after the separator
  const records = raw.split(LOG_RECORD_SEPARATOR).filter((r) => r.trim().length > 0);

  for (const record of records) {
    const result = parseCommitRecord(record);
    if (result.ok) {
      commits.push(result.commit);
    } else {
      errors.push(result.error);
    }
  }

  return { commits, errors };
}

/**
 * Parse a single commit record
 */
function parseCommitRecord(
  record: string
): { ok: true; commit: Commit } | { ok: false; error: ParseError } {
  const fields = record.split(FIELD_SEPARATOR);

  if (fields.length < EXPECTED_FIELDS) {
    return {
      ok: false,
      error: {
        type: 'malformed_record',
        message: `Expected ${EXPECTED_FIELDS} fields, got ${fields.length}`,
        record: record.substring(0, 100),
      },
    };
  }

  const [hashRaw, parentsRaw, treeRaw, authorName, authorEmail, authorDateRaw, ...messageParts] =
    fields;

  const hash = hashRaw?.trim();
  if (!hash || !isValidHash(hash)) {
    return {
      ok: false,
      error: {
        type: 'invalid_hash',
        message: `Invalid commit hash: ${hash}`,
        field: 'hash',
        record: record.substring(0, 100),
      },
    };
  }

  const tree = treeRaw?.trim();
  if (!tree || !isValidHash(tree)) {
    return {
      ok: false,
      error: {
        type: 'invalid_hash',
        message: `Invalid tree hash: ${tree}`,
        field: 'tree',
        record: record.substring(0, 100),
      },
    };
  }

  const authorDate = authorDateRaw?.trim() ?? '';
  if (!isValidDate(authorDate)) {
    return {
      ok: false,
      error: {
        type: 'invalid_date',
        message: `Invalid author date: ${authorDateRaw}`,
        field: 'authorDate',
        record: record.substring(0, 100),
      },
    };
  }

  const commit: Commit = {
    hash: unsafeObjectId(hash),
    parents: parseParentHashes(parentsRaw ?? ''),
    tree: unsafeObjectId(tree),
    author: { name: authorName ?? '', email: authorEmail ?? '' },
    authorDate,
    message: messageParts.join(FIELD_SEPARATOR),
  };

  return { ok: true, commit };
}

/**
 * Validate a git hash (40 hex characters)
 */
function isValidHash(value: string): boolean {
  return /^[a-f0-9]{40}$/i.test(value);
}

/**
 * Parse space-separated parent hashes
 */
function parseParentHashes(raw: string): ObjectId[] {
  const trimmed = raw.trim();
  if (!trimmed) {
    return [];
  }

  return trimmed
    .split(/\s+/)
    .filter((h) => isValidHash(h))
    .map((h) => unsafeObjectId(h));
}

/**
 * True for a non-empty date string JavaScript can read
 */
function isValidDate(value: string): boolean {
  return value.length > 0 && !isNaN(new Date(value).getTime());
}

// ============================================
// REF PARSING
// ============================================

/**
 * Result of parsing refs
 */
export interface ParseRefsResult {
  readonly refs: GitRef[];
  readonly errors: ParseError[];
}

/**
 * Namespace prefixes, most specific first
 */
const REF_NAMESPACES: ReadonlyArray<readonly [string, RefKind]> = [
  ['refs/heads/', 'branch'],
  ['refs/tags/', 'tag'],
  ['refs/remotes/', 'remote'],
];

/**
 * Parse git for-each-ref output into GitRef objects
 *
 * Expects output from:
 * git for-each-ref --format='%(objectname) %(refname)'
 *
 * Every namespace is kept; callers decide which kinds to walk.
 */
export function parseRefs(raw: string): ParseRefsResult {
  const refs: GitRef[] = [];
  const errors: ParseError[] = [];

  if (!raw || raw.trim().length === 0) {
    return { refs, errors };
  }

  const lines = raw.split('\n').filter((line) => line.trim().length > 0);

  for (const line of lines) {
    const result = parseRefLine(line);
    if (result.ok) {
      refs.push(result.ref);
    } else {
      errors.push(result.error);
    }
  }

  return { refs, errors };
}

/**
 * Parse a single ref line
 */
function parseRefLine(line: string): { ok: true; ref: GitRef } | { ok: false; error: ParseError } {
  // Format: "hash refname"
  const parts = line.trim().split(/\s+/);

  if (parts.length !== 2) {
    return {
      ok: false,
      error: {
        type: 'malformed_record',
        message: `Expected 2 parts in ref line, got ${parts.length}`,
        record: line,
      },
    };
  }

  const [hash, fullName] = parts;

  if (!hash || !isValidHash(hash)) {
    return {
      ok: false,
      error: {
        type: 'invalid_hash',
        message: `Invalid ref hash: ${hash}`,
        record: line,
      },
    };
  }

  if (!fullName) {
    return {
      ok: false,
      error: { type: 'malformed_record', message: 'Missing ref name', record: line },
    };
  }

  let kind: RefKind = 'other';
  let name = fullName;
  for (const [prefix, prefixKind] of REF_NAMESPACES) {
    if (fullName.startsWith(prefix)) {
      kind = prefixKind;
      name = fullName.slice(prefix.length);
      break;
    }
  }

  return {
    ok: true,
    ref: {
      name,
      fullName,
      objectId: unsafeObjectId(hash),
      kind,
    },
  };
}

// ============================================
// TREE PARSING
// ============================================

/**
 * Result of parsing a tree listing
 */
export interface ParseTreeResult {
  readonly entries: TreeEntry[];
  readonly errors: ParseError[];
}

const TREE_ENTRY_TYPES: ReadonlySet<string> = new Set<TreeEntryType>(['blob', 'tree', 'commit']);

function isTreeEntryType(value: string): value is TreeEntryType {
  return TREE_ENTRY_TYPES.has(value);
}

/**
 * Parse `git ls-tree -z` output
 *
 * Each entry is "<mode> SP <type> SP <hash> TAB <name>" terminated by NUL,
 * so names may contain spaces, tabs and newlines.
 */
export function parseTreeEntries(raw: string): ParseTreeResult {
  const entries: TreeEntry[] = [];
  const errors: ParseError[] = [];

  for (const record of raw.split('\x00')) {
    if (record.length === 0) {
      continue;
    }

    const tab = record.indexOf('\t');
    const header = tab === -1 ? [] : record.slice(0, tab).split(' ');
    const [mode, type, hash] = header;

    if (header.length !== 3 || !mode || !type || !hash) {
      errors.push({
        type: 'malformed_record',
        message: 'Expected "<mode> <type> <hash>\\t<name>"',
        record: record.substring(0, 100),
      });
      continue;
    }

    if (!/^[0-7]{6}$/.test(mode) || !isTreeEntryType(type)) {
      errors.push({
        type: 'invalid_mode',
        message: `Unsupported tree entry: ${mode} ${type}`,
        record: record.substring(0, 100),
      });
      continue;
    }

    if (!isValidHash(hash)) {
      errors.push({
        type: 'invalid_hash',
        message: `Invalid entry hash: ${hash}`,
        record: record.substring(0, 100),
      });
      continue;
    }

    entries.push({ mode, type, hash: unsafeObjectId(hash), name: record.slice(tab + 1) });
  }

  return { entries, errors };
}

// ============================================
// FILE MODES
// ============================================

/**
 * Modes git stores for file content (regular, group-writable legacy, executable, symlink)
 */
const FILE_MODES: ReadonlySet<string> = new Set(['100644', '100664', '100755', '120000']);

/**
 * Mode of a subdirectory entry
 */
const DIR_MODE = '040000';

/**
 * True when a tree entry references file content
 */
export function isFileMode(mode: string): boolean {
  return FILE_MODES.has(mode);
}

/**
 * True when a tree entry references a subtree
 * Submodule entries (160000) are neither files nor directories
 */
export function isDirMode(mode: string): boolean {
  return mode === DIR_MODE;
}

// ============================================
// UTILITY EXPORTS
// ============================================

export { isValidHash };

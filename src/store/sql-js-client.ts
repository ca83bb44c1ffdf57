/**
 * sql.js implementation of DatabaseClient
 *
 * sql.js keeps the whole database in memory; durability comes from
 * exporting the image to a file on flush and reading it back on open.
 * A file-backed client holds an exclusive lock on its file from open to
 * close, so two processes never load the same image and overwrite each
 * other's writes.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import lockfile from 'proper-lockfile';
import type { Database, SqlJsStatic } from 'sql.js';
import type { DatabaseClient, ExecuteResult, Row, SqlValue } from './database-client.js';

export interface SqlJsClientOptions {
  /** Database file; omit for a purely in-memory database */
  readonly path?: string;
  /** Pre-loaded sql.js module (loaded dynamically if not provided) */
  readonly sqlJs?: SqlJsStatic;
}

let sqlJsModule: Promise<SqlJsStatic> | null = null;

/**
 * Load the sql.js WebAssembly module once per process
 */
function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsModule) {
    sqlJsModule = import('sql.js').then((mod) => mod.default());
  }
  return sqlJsModule;
}

/**
 * Thrown by `SqlJsClient.open` when another client holds the file
 */
export class DatabaseLockedError extends Error {
  constructor(readonly path: string) {
    super(`Database ${path} is in use by another process`);
    this.name = 'DatabaseLockedError';
  }
}

/**
 * Exclusive hold on a database file
 */
interface FileLock {
  release(): Promise<void>;
  /** Set when the lock was lost (its lock file went stale or was removed) */
  readonly compromised: Error | null;
}

export class SqlJsClient implements DatabaseClient {
  private inTransaction = false;
  private pendingFlush: Promise<void> = Promise.resolve();

  private constructor(
    private readonly db: Database,
    private readonly path: string | undefined,
    private readonly lock: FileLock | null
  ) {}

  /**
   * Open the database at `options.path`, creating it when the file does not exist
   *
   * Fails with `DatabaseLockedError` when another client has the file open.
   */
  static async open(options: SqlJsClientOptions = {}): Promise<SqlJsClient> {
    const SQL = options.sqlJs ?? (await loadSqlJs());
    const path = options.path;
    if (!path) {
      return new SqlJsClient(new SQL.Database(), undefined, null);
    }

    const lock = await acquireLock(path);
    try {
      const data = await readIfExists(path);
      const db = data ? new SQL.Database(data) : new SQL.Database();
      return new SqlJsClient(db, path, lock);
    } catch (error) {
      await lock.release();
      throw error;
    }
  }

  async query(sql: string, params?: readonly SqlValue[]): Promise<Row[]> {
    const stmt = this.db.prepare(sql);
    try {
      if (params && params.length > 0) {
        stmt.bind([...params]);
      }
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  async execute(sql: string, params?: readonly SqlValue[]): Promise<ExecuteResult> {
    if (params && params.length > 0) {
      this.db.run(sql, [...params]);
    } else {
      this.db.run(sql);
    }

    const changes = this.db.getRowsModified();
    const rows = await this.query('SELECT last_insert_rowid() AS id');
    const id = rows[0]?.['id'];

    return { lastInsertRowId: typeof id === 'number' ? id : 0, changes };
  }

  async transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return fn(this);
    }

    this.inTransaction = true;
    try {
      this.db.run('BEGIN TRANSACTION');
      const result = await fn(this);
      this.db.run('COMMIT');
      return result;
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  async flush(): Promise<void> {
    const path = this.path;
    if (!path) {
      return;
    }
    const lost = this.lock?.compromised;
    if (lost) {
      throw new Error(`Lost the lock on ${path}: ${lost.message}`);
    }
    // Flushes from concurrent callers are serialised on one temp file
    const next = this.pendingFlush.then(() => writeImage(path, this.db.export()));
    this.pendingFlush = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    try {
      await this.flush();
    } finally {
      await this.discard();
    }
  }

  /**
   * Close without writing the file
   */
  async discard(): Promise<void> {
    this.db.close();
    await this.lock?.release();
  }
}

/**
 * A lock not refreshed for this long is considered abandoned
 */
const LOCK_STALE_MS = 60_000;

/**
 * Take the lock beside `path` without waiting
 * The lock file is refreshed in the background, so a crashed holder's lock
 * goes stale and can be taken over.
 */
async function acquireLock(path: string): Promise<FileLock> {
  await mkdir(dirname(path), { recursive: true });

  let compromised: Error | null = null;
  const release = await lockfile
    .lock(path, {
      realpath: false,
      retries: 0,
      stale: LOCK_STALE_MS,
      onCompromised: (error) => {
        compromised = error;
      },
    })
    .catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ELOCKED') {
        throw new DatabaseLockedError(path);
      }
      throw error;
    });

  let released = false;
  return {
    async release() {
      if (released || compromised) {
        return;
      }
      released = true;
      await release();
    },
    get compromised() {
      return compromised;
    },
  };
}

/**
 * Write beside the target and rename, so a crash never leaves half a file
 */
async function writeImage(path: string, image: Uint8Array): Promise<void> {
  const tmpPath = `${path}.tmp`;
  await writeFile(tmpPath, image);
  await rename(tmpPath, path);
}

async function readIfExists(path: string): Promise<Uint8Array | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

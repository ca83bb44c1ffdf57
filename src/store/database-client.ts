/**
 * Database client abstraction
 *
 * Minimal async interface over an SQL driver. The graph store speaks only
 * this interface; `SqlJsClient` is the production implementation.
 */

/**
 * Values SQLite can bind and return
 */
export type SqlValue = number | string | Uint8Array | null;

/**
 * A result row keyed by column name
 */
export type Row = Readonly<Record<string, SqlValue>>;

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecuteResult {
  /** Last inserted row ID (for auto-increment columns) */
  lastInsertRowId: number;
  /** Number of rows affected by the statement */
  changes: number;
}

export interface DatabaseClient {
  /**
   * Execute a SQL query that returns rows
   *
   * @param sql SQL query string with ? placeholders
   * @param params Parameter values (positional)
   */
  query(sql: string, params?: readonly SqlValue[]): Promise<Row[]>;

  /**
   * Execute a SQL statement that doesn't return rows
   *
   * Use for INSERT, UPDATE, DELETE, and DDL statements.
   */
  execute(sql: string, params?: readonly SqlValue[]): Promise<ExecuteResult>;

  /**
   * Execute multiple statements within a transaction
   *
   * Commits on success, rolls back on error.
   */
  transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T>;

  /**
   * Persist to the backing file, if any
   */
  flush(): Promise<void>;

  /**
   * Flush and close the database connection
   *
   * After calling close(), the client should not be used.
   */
  close(): Promise<void>;
}

/**
 * SQL schema migrations
 *
 * Versioned schema bootstrap for the graph database.
 */

import type { DatabaseClient } from './database-client.js';

export interface Migration {
  /** Migration version number (must be sequential) */
  version: number;
  name: string;
  /** SQL statements (semicolon-separated) */
  up: string;
}

/**
 * All migrations in order
 *
 * New migrations should be added at the end with incrementing version numbers.
 */
export const migrations: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      CREATE TABLE IF NOT EXISTS uploads (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS nodes (
        id TEXT NOT NULL,
        upload_id INTEGER NOT NULL,
        type TEXT NOT NULL,
        label TEXT NOT NULL DEFAULT '',
        meta TEXT NOT NULL DEFAULT '',
        PRIMARY KEY (id, upload_id)
      );

      CREATE TABLE IF NOT EXISTS edges (
        upload_id INTEGER NOT NULL,
        source TEXT NOT NULL,
        target TEXT NOT NULL,
        rel TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS edges_upload_idx ON edges(upload_id);
    `,
  },
];

/**
 * Create the version table if needed and apply every pending migration
 */
export async function initializeSchema(db: DatabaseClient): Promise<void> {
  await db.execute(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const currentVersion = await getSchemaVersion(db);

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      await db.transaction(async (tx) => {
        for (const stmt of splitStatements(migration.up)) {
          await tx.execute(stmt);
        }
        await tx.execute('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)', [
          migration.version,
          Date.now(),
        ]);
      });
    }
  }
}

/**
 * Highest applied migration, 0 on a fresh database
 */
export async function getSchemaVersion(db: DatabaseClient): Promise<number> {
  const rows = await db.query('SELECT MAX(version) AS version FROM schema_version');
  const version = rows[0]?.['version'];
  return typeof version === 'number' ? version : 0;
}

function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

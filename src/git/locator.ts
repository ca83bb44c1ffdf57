/**
 * Repository locator
 *
 * Uploaded archives rarely have the repository at their top level: the
 * metadata directory sits somewhere below a wrapper folder, or the archive
 * holds a bare repository. This module finds where to open.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Name of the metadata directory of a working copy
 */
export const METADATA_DIR = '.git';

/**
 * File every git directory carries
 */
export const HEAD_FILE = 'HEAD';

/**
 * How the repository was recognised
 * - worktree: a `.git` directory was found, `path` is that directory
 * - bare: a `HEAD` file was found, `path` is its directory
 * - fallback: nothing matched, `path` is the search root
 */
export type RepositoryLayout = 'worktree' | 'bare' | 'fallback';

export interface LocatedRepository {
  readonly path: string;
  readonly layout: RepositoryLayout;
}

/**
 * Find the repository to open inside `root`
 *
 * Depth-first, entries in lexical order. The first `.git` directory or
 * `HEAD` file wins and ends the search; a `.git` directory is never entered.
 * Directories that cannot be read are skipped. Symlinks are not followed.
 */
export async function locateRepository(root: string): Promise<LocatedRepository> {
  const found = await search(root);
  return found ?? { path: root, layout: 'fallback' };
}

async function search(dir: string): Promise<LocatedRepository | null> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const path = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (entry.name === METADATA_DIR) {
        return { path, layout: 'worktree' };
      }
      const nested = await search(path);
      if (nested) {
        return nested;
      }
    } else if (entry.isFile() && entry.name === HEAD_FILE) {
      return { path: dir, layout: 'bare' };
    }
  }

  return null;
}

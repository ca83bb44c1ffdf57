#!/usr/bin/env node
/**
 * gitgraph CLI
 *
 * Extracts a repository's object graph into a graph database and exports it.
 *
 * Usage:
 *   gitgraph parse <dir> [--name <name>]    Parse the repository found under <dir>
 *   gitgraph export <id> [--pretty]         Print an upload's graph as JSON
 *   gitgraph uploads                        List uploads
 */

import { basename } from 'node:path';
import { createGitExecutor } from '../git/executor.js';
import type { GitGraphError } from '../git/types.js';
import { exportGraph } from '../graph/exporter.js';
import { parse } from '../graph/parse.js';
import type { SqlGraphStore } from '../store/sql-graph-store.js';
import { openGraphStore } from '../store/sql-graph-store.js';
import type { CliArgs } from './args.js';
import { parseArgs } from './args.js';
import { formatError, formatParseSummary, formatUploads, formatWarning } from './render.js';

// ============================================
// HELP TEXT
// ============================================

const HELP_TEXT = `
gitgraph - Git object graph extraction

Usage:
  gitgraph parse <dir> [options]      Register an upload and parse the repository under <dir>
  gitgraph export <id> [options]      Print the graph of upload <id> as JSON
  gitgraph uploads [options]          List uploads

Options:
  --db <file>           Graph database file (default: $GITGRAPH_DB or ./gitgraph.db)
  --name <name>         Upload name for parse (default: the directory name)
  --pretty              Indent exported JSON
  --no-color            Disable colors
  -h, --help            Show this help message
  -v, --version         Show version

Examples:
  gitgraph parse ./extracted-upload
  gitgraph export 3 --pretty > graph.json
`;

const VERSION = '0.1.0';

// ============================================
// MAIN
// ============================================

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), process.env);

  const useColors = !args.noColor && process.stderr.isTTY && !process.env['NO_COLOR'];

  if (args.error) {
    console.error(formatError({ type: 'parse_error', message: args.error }, useColors));
    console.error('Run `gitgraph help` for usage.');
    return 1;
  }

  if (args.command === 'help') {
    console.log(HELP_TEXT);
    return 0;
  }

  if (args.command === 'version') {
    console.log(`gitgraph v${VERSION}`);
    return 0;
  }

  const storeResult = await openGraphStore({ path: args.db });
  if (!storeResult.ok) {
    console.error(formatError(storeResult.error, useColors));
    return 1;
  }
  const store = storeResult.value;

  const failure = await runCommand(args, store, useColors);
  const closed = await store.close();

  if (failure) {
    console.error(formatError(failure, useColors));
    return 1;
  }
  if (!closed.ok) {
    console.error(formatError(closed.error, useColors));
    return 1;
  }
  return 0;
}

/**
 * Run a store-backed command; returns the error to report, if any
 */
async function runCommand(
  args: CliArgs,
  store: SqlGraphStore,
  useColors: boolean
): Promise<GitGraphError | null> {
  switch (args.command) {
    case 'parse': {
      const path = args.path ?? process.cwd();
      const upload = await store.createUpload(args.name ?? basename(path));
      if (!upload.ok) {
        return upload.error;
      }

      const result = await parse(path, upload.value.id, {
        executor: createGitExecutor(),
        store,
      });
      if (!result.ok) {
        return result.error;
      }

      for (const warning of result.value.warnings) {
        console.error(formatWarning(warning, useColors));
      }
      console.log(formatParseSummary(result.value, upload.value, process.stdout.isTTY && useColors));
      return null;
    }

    case 'export': {
      const scope = args.scope ?? 0;
      const upload = await store.getUpload(scope);
      if (!upload.ok) {
        return upload.error;
      }
      if (!upload.value) {
        return { type: 'store_failed', message: `No upload with id ${scope}` };
      }

      const graph = await exportGraph(store, scope);
      if (!graph.ok) {
        return graph.error;
      }
      console.log(JSON.stringify(graph.value, null, args.pretty ? 2 : undefined));
      return null;
    }

    case 'uploads': {
      const uploads = await store.listUploads();
      if (!uploads.ok) {
        return uploads.error;
      }
      console.log(formatUploads(uploads.value, process.stdout.isTTY && useColors));
      return null;
    }

    case 'help':
    case 'version':
      return null;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });

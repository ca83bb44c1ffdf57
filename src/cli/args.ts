/**
 * Command-line argument parsing
 */

import { resolve } from 'node:path';

export type CliCommand = 'parse' | 'export' | 'uploads' | 'help' | 'version';

export interface CliArgs {
  command: CliCommand;
  /** Directory to parse */
  path?: string;
  /** Upload name recorded for `parse` (default: the directory name) */
  name?: string;
  /** Graph scope for `export` */
  scope?: number;
  /** Database file */
  db: string;
  pretty: boolean;
  noColor: boolean;
  /** Set when the arguments cannot be used */
  error?: string;
}

/**
 * Database file used when neither `--db` nor `GITGRAPH_DB` is given
 */
export const DEFAULT_DB_PATH = 'gitgraph.db';

export function parseArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): CliArgs {
  const args: CliArgs = {
    command: 'help',
    db: resolve(env['GITGRAPH_DB'] ?? DEFAULT_DB_PATH),
    pretty: false,
    noColor: false,
  };

  let i = 0;
  const first = argv[0];

  switch (first) {
    case 'parse':
    case 'export':
    case 'uploads':
      args.command = first;
      i++;
      break;
    case 'version':
    case '-v':
    case '--version':
      args.command = 'version';
      return args;
    case undefined:
    case 'help':
    case '-h':
    case '--help':
      return args;
    default:
      args.error = `Unknown command: ${first}`;
      return args;
  }

  while (i < argv.length) {
    const arg = argv[i] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        args.command = 'help';
        return args;

      case '--db': {
        i++;
        const db = argv[i];
        if (!db) {
          args.error = '--db requires a file path';
          return args;
        }
        args.db = resolve(db);
        break;
      }

      case '--name': {
        i++;
        const name = argv[i];
        if (!name) {
          args.error = '--name requires a value';
          return args;
        }
        args.name = name;
        break;
      }

      case '--pretty':
        args.pretty = true;
        break;

      case '--no-color':
        args.noColor = true;
        break;

      default:
        if (arg.startsWith('-')) {
          args.error = `Unknown option: ${arg}`;
          return args;
        }
        if (args.command === 'parse' && args.path === undefined) {
          args.path = resolve(arg);
        } else if (args.command === 'export' && args.scope === undefined) {
          const scope = Number(arg);
          if (!Number.isInteger(scope) || scope <= 0) {
            args.error = `Invalid upload id: ${arg}`;
            return args;
          }
          args.scope = scope;
        } else {
          args.error = `Unexpected argument: ${arg}`;
          return args;
        }
        break;
    }

    i++;
  }

  if (args.command === 'parse' && args.path === undefined) {
    args.error = 'parse requires a directory';
  } else if (args.command === 'export' && args.scope === undefined) {
    args.error = 'export requires an upload id';
  }

  return args;
}

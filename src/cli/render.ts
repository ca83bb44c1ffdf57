/**
 * Terminal output for the gitgraph CLI
 */

import type { GitGraphError } from '../git/types.js';
import type { ParseSummary } from '../graph/parse.js';
import type { Upload } from '../store/types.js';

// ============================================
// ANSI COLOR CODES
// ============================================

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

function color(text: string, enabled: boolean, ...codes: string[]): string {
  return enabled ? `${codes.join('')}${text}${COLORS.reset}` : text;
}

// ============================================
// MESSAGES
// ============================================

export function formatWarning(message: string, colors: boolean): string {
  return `${color('Warning:', colors, COLORS.yellow)} ${message}`;
}

export function formatError(error: GitGraphError, colors: boolean): string {
  const lines = [`${color('Error:', colors, COLORS.red, COLORS.bold)} ${error.message}`];
  const stderr = error.stderr?.trim();
  if (stderr) {
    lines.push(color(stderr, colors, COLORS.dim));
  }
  if (error.type === 'graph_incomplete') {
    lines.push('The stored graph is partial; parse the repository again into a new upload.');
  }
  return lines.join('\n');
}

// ============================================
// SUMMARIES
// ============================================

/**
 * Multi-line report of a finished parse
 */
export function formatParseSummary(summary: ParseSummary, upload: Upload, colors: boolean): string {
  const { stats } = summary;
  const lines = [
    `${color(`Upload ${upload.id}`, colors, COLORS.bold)} ${upload.name}`,
    `  repository  ${summary.repository.path} (${summary.repository.layout})`,
    `  refs        ${stats.refsFound} walked, ${stats.refsSkipped} skipped, ${stats.refsIgnored} ignored`,
    `  commits     ${stats.commitsVisited} (${stats.commitVisits} visits)`,
    `  trees       ${stats.treesVisited} visits, ${stats.unresolvedTrees} unresolved`,
    `  blobs       ${stats.blobsVisited} visits`,
    `  writes      ${stats.nodeWrites} nodes, ${stats.edgeWrites} edges, ${stats.cachedNodeWrites} cached`,
    color(`Parsed in ${summary.durationMs}ms`, colors, COLORS.dim),
  ];
  return lines.join('\n');
}

/**
 * One line per upload: id, creation time, name
 */
export function formatUploads(uploads: readonly Upload[], colors: boolean): string {
  if (uploads.length === 0) {
    return 'No uploads.';
  }
  const width = Math.max(...uploads.map((u) => String(u.id).length));
  return uploads
    .map(
      (u) =>
        `${color(String(u.id).padStart(width), colors, COLORS.cyan)}  ${u.createdAt.toISOString()}  ${u.name}`
    )
    .join('\n');
}

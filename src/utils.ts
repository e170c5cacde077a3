import * as path from 'path';

import type { MergeAnalysis } from './types';

/** ANSI color helpers (console only) */
export const RED = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const GREEN = (s: string) => `\x1b[32m${s}\x1b[0m`;
export const YELLOW = (s: string) => `\x1b[33m${s}\x1b[0m`;
export const CYAN = (s: string) => `\x1b[36m${s}\x1b[0m`;
export const GRAY = (s: string) => `\x1b[90m${s}\x1b[0m`;

/** Timestamp string yyyymmddhhmmss for output filenames */
export function makeStartTs(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/**
 * Return a path relative to `root`, using forward slashes.
 * If the path is not under root, return the original path.
 */
export function relPath(absPath: string, root: string): string {
  const rel = path.relative(root, absPath);
  // path.relative returns absolute if on different Windows drive
  if (path.isAbsolute(rel)) return absPath.replace(/\\/g, '/');
  return rel.replace(/\\/g, '/');
}

/**
 * Render a resolution-space size. Exact integers print as-is; anything past
 * Number.MAX_SAFE_INTEGER is approximate and prints in exponent form.
 *   12 → "12",  2**60 → "~1.153e+18",  Infinity → "∞"
 */
export function formatCount(n: number): string {
  if (!Number.isFinite(n)) return '∞';
  if (Number.isSafeInteger(n)) return String(n);
  return `~${n.toExponential(3)}`;
}

/**
 * Short status word for a merge analysis
 */
export function matchStatus(analysis: MergeAnalysis): 'failed' | 'found' | 'not-found' | 'undecided' {
  if (analysis.errorMessage !== undefined || !analysis.match) return 'failed';
  if (analysis.match.index !== null) return 'found';
  return analysis.match.exhaustive ? 'not-found' : 'undecided';
}

/**
 * Format a single merge line for display:
 *   [FOUND    ] 1a2b3c4  2 file(s)  3 conflict(s)  16 resolution(s)  #5
 *   [UNDECIDED] 9f8e7d6  9 file(s)  30 conflict(s)  ~1.153e+18 resolution(s)
 */
export function formatMergeLine(analysis: MergeAnalysis): string {
  const status = matchStatus(analysis);
  const tag = `[${status.toUpperCase().padEnd(9)}]`;
  if (status === 'failed') {
    return `${tag} ${analysis.shortId}  ${analysis.errorMessage ?? 'unknown error'}`;
  }
  const parts = [
    `${tag} ${analysis.shortId}`,
    `${analysis.files.length} file(s)`,
    `${analysis.conflicts} conflict(s)`,
    `${formatCount(analysis.resolutions)} resolution(s)`,
  ];
  if (analysis.match?.index != null) parts.push(`#${analysis.match.index}`);
  return parts.join('  ');
}

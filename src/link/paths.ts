/**
 * Path mapping between the live tree and the history tree.
 *
 * Pure string functions; none of them touch the filesystem. The history root
 * mirrors the base-relative namespace one to one, so a history root serves a
 * single base.
 */

import { isAbsolute, join, normalize } from 'node:path';

/** Base-relative target → absolute live path. Absolute targets pass through. */
export function toLiveAbsolute(base: string, rel: string): string {
  if (isAbsolute(rel)) return rel;
  if (base === '/') return normalize('/' + rel);
  return normalize(join(base, rel));
}

/** Base-relative target → its mirror under the history root. */
export function toHistoryPath(historyRoot: string, rel: string): string {
  return normalize(join(historyRoot, rel.replace(/^\/+/, '')));
}

/** A trailing separator marks a directory target. */
export function isDirectoryTarget(rel: string): boolean {
  return rel.endsWith('/');
}

export function stripTrailingSlash(rel: string): string {
  return rel.replace(/\/+$/, '');
}

import { existsSync, readdirSync, statSync, writeFileSync } from 'node:fs';
import { join, relative } from 'node:path';
import { isExcluded, isInsideGitDir } from './excludes.js';
import { stripTrailingSlash, toHistoryPath } from './paths.js';

export const PLACEHOLDER_FILE_NAME = '.gitkeep';

function walk(dir: string, histDir: string, excludes: readonly string[]): number {
  const rel = relative(histDir, dir);
  if (isExcluded(rel, excludes) || isInsideGitDir(rel)) return 0;

  const entries = readdirSync(dir, { withFileTypes: true });
  if (entries.length === 0) {
    writeFileSync(join(dir, PLACEHOLDER_FILE_NAME), '');
    return 1;
  }

  let written = 0;
  // Symlinked directories are not followed.
  for (const entry of entries) {
    if (entry.isDirectory()) written += walk(join(dir, entry.name), histDir, excludes);
  }
  return written;
}

/**
 * Write a zero-byte `.gitkeep` into every empty directory under each target's
 * history mirror so git can see it. Excluded paths and `.git` are skipped.
 * Returns the number of placeholders written by this call.
 */
export function trackEmptyDirs(histDir: string, targets: readonly string[], excludes: readonly string[]): number {
  let written = 0;
  for (const target of targets) {
    const root = toHistoryPath(histDir, stripTrailingSlash(target));
    if (!existsSync(root) || !statSync(root).isDirectory()) continue;
    written += walk(root, histDir, excludes);
  }
  return written;
}

/**
 * Migration and symlink engine.
 *
 * Moves each target from the live tree into the history tree and leaves a
 * symlink behind, so later writes land in the tracked repo. Data present on
 * only one side is never dropped:
 *
 * - directories are merge-copied into history (history wins on collisions),
 *   then the live directory is replaced by a link;
 * - files move into history unless history already has one, in which case
 *   the live copy is discarded;
 * - missing targets get an empty directory or empty file in history.
 *
 * When a live directory cannot itself become a link (mount point, read-only
 * parent), its top-level children are linked one by one instead.
 */

import {
  accessSync,
  constants,
  copyFileSync,
  existsSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  readlinkSync,
  renameSync,
  rmSync,
  statSync,
  symlinkSync,
  unlinkSync,
  utimesSync,
  writeFileSync,
} from 'node:fs';
import { dirname, join } from 'node:path';
import { isErrnoException } from '../errors.js';
import { mergeCopy } from './merge-copy.js';
import { isDirectoryTarget, stripTrailingSlash, toHistoryPath, toLiveAbsolute } from './paths.js';
import type { LinkReport } from '../types.js';

/**
 * Make `livePath` a symlink to `historyPath`, replacing whatever is there.
 * Returns false when the link already pointed at `historyPath`.
 */
export function ensureSymlink(livePath: string, historyPath: string): boolean {
  mkdirSync(dirname(livePath), { recursive: true });

  const stat = lstatSync(livePath, { throwIfNoEntry: false });
  if (stat?.isSymbolicLink()) {
    const current = readlinkSync(livePath);
    if (current === historyPath) return false;
    console.error(`Relinking ${livePath}: ${current} -> ${historyPath}`);
    unlinkSync(livePath);
  } else if (stat?.isDirectory()) {
    rmSync(livePath, { recursive: true, force: true });
  } else if (stat) {
    unlinkSync(livePath);
  }

  symlinkSync(historyPath, livePath);
  return true;
}

/**
 * Per-child linking: clear the live directory's top level, then link every
 * top-level history entry into it under the same name. The caller has
 * already merged live content into `historyDir`.
 */
export function linkDirContentsInPlace(liveDir: string, historyDir: string): void {
  mkdirSync(historyDir, { recursive: true });

  if (existsSync(liveDir) && statSync(liveDir).isDirectory()) {
    for (const entry of readdirSync(liveDir, { withFileTypes: true })) {
      const child = join(liveDir, entry.name);
      if (entry.isDirectory()) {
        rmSync(child, { recursive: true, force: true });
      } else {
        unlinkSync(child);
      }
    }
  } else {
    mkdirSync(liveDir, { recursive: true });
  }

  for (const name of readdirSync(historyDir)) {
    symlinkSync(join(historyDir, name), join(liveDir, name));
  }
}

/** Create history directories for directory-typed targets, and parents for file targets. */
export function precreateDirTargets(histDir: string, targets: readonly string[]): void {
  for (const target of targets) {
    const historyPath = toHistoryPath(histDir, stripTrailingSlash(target));
    mkdirSync(isDirectoryTarget(target) ? historyPath : dirname(historyPath), { recursive: true });
  }
}

function isWritable(path: string): boolean {
  try {
    accessSync(path, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

function isPermissionError(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'EPERM' || error.code === 'EACCES');
}

/** rename(2), or copy and unlink when source and destination sit on different devices. */
function moveFile(src: string, dst: string): void {
  try {
    renameSync(src, dst);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') throw error;
    copyFileSync(src, dst);
    const stat = statSync(src);
    utimesSync(dst, stat.atime, stat.mtime);
    unlinkSync(src);
  }
}

/** Reconcile one target. Filesystem errors other than the fallback condition propagate. */
export function reconcileTarget(base: string, histDir: string, target: string): LinkReport {
  const rel = stripTrailingSlash(target);
  const livePath = toLiveAbsolute(base, rel);
  const historyPath = toHistoryPath(histDir, rel);
  const report = (action: LinkReport['action'], copied = 0): LinkReport => ({
    target,
    livePath,
    historyPath,
    action,
    copied,
  });

  mkdirSync(dirname(historyPath), { recursive: true });

  const stat = lstatSync(livePath, { throwIfNoEntry: false });

  if (stat?.isSymbolicLink()) {
    return report(ensureSymlink(livePath, historyPath) ? 'relinked' : 'unchanged');
  }

  if (stat?.isDirectory()) {
    const copied = mergeCopy(livePath, historyPath);
    try {
      rmSync(livePath, { recursive: true, force: true });
      symlinkSync(historyPath, livePath);
      return report('merged', copied);
    } catch (error) {
      const parent = dirname(livePath);
      if (!isPermissionError(error) && isWritable(parent)) throw error;
      console.error(
        `Cannot replace ${livePath} with a symlink (${error instanceof Error ? error.message : String(error)}); linking its children instead`,
      );
      linkDirContentsInPlace(livePath, historyPath);
      return report('fallback', copied);
    }
  }

  if (stat) {
    let action: LinkReport['action'];
    if (!existsSync(historyPath)) {
      moveFile(livePath, historyPath);
      action = 'moved';
    } else {
      unlinkSync(livePath);
      action = 'discarded';
    }
    ensureSymlink(livePath, historyPath);
    return report(action);
  }

  if (isDirectoryTarget(target)) {
    mkdirSync(historyPath, { recursive: true });
  } else if (!existsSync(historyPath)) {
    writeFileSync(historyPath, '');
  }
  ensureSymlink(livePath, historyPath);
  return report('created');
}

/** Reconcile every target in declared order. */
export function migrateAndLink(base: string, histDir: string, targets: readonly string[]): LinkReport[] {
  const reports: LinkReport[] = [];
  for (const target of targets) {
    const result = reconcileTarget(base, histDir, target);
    if (result.action !== 'unchanged') {
      console.error(`Linked ${result.livePath} -> ${result.historyPath} (${result.action})`);
    }
    reports.push(result);
  }
  return reports;
}

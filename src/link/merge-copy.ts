/**
 * Non-destructive merge copy of a directory tree.
 *
 * Entries already present at the destination are never overwritten, whatever
 * their type; previously synced history wins over fresh live state. Symlinks
 * are recreated as symlinks, except those pointing into the destination tree
 * (left behind by per-child linking), which would become self-references.
 * File mode and timestamps are carried over.
 */

import {
  copyFileSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  readlinkSync,
  symlinkSync,
  utimesSync,
} from 'node:fs';
import { dirname, join, resolve, sep } from 'node:path';

function pointsInto(link: string, root: string): boolean {
  const target = resolve(dirname(link), readlinkSync(link));
  return target === root || target.startsWith(root + sep);
}

function mergeInto(srcDir: string, dstDir: string, dstRoot: string): number {
  mkdirSync(dstDir, { recursive: true });
  let copied = 0;

  for (const entry of readdirSync(srcDir, { withFileTypes: true })) {
    const src = join(srcDir, entry.name);
    const dst = join(dstDir, entry.name);
    const existing = lstatSync(dst, { throwIfNoEntry: false });

    if (entry.isDirectory()) {
      if (existing && !existing.isDirectory()) continue;
      copied += mergeInto(src, dst, dstRoot);
      continue;
    }

    if (existing) continue;

    if (entry.isSymbolicLink()) {
      if (pointsInto(src, dstRoot)) continue;
      symlinkSync(readlinkSync(src), dst);
      copied++;
    } else if (entry.isFile()) {
      copyFileSync(src, dst);
      const stat = lstatSync(src);
      utimesSync(dst, stat.atime, stat.mtime);
      copied++;
    }
    // Sockets, FIFOs and devices are not carried into history.
  }

  return copied;
}

/** Copy everything under `srcDir` that is absent under `dstDir`. Returns files and links copied. */
export function mergeCopy(srcDir: string, dstDir: string): number {
  return mergeInto(srcDir, dstDir, resolve(dstDir));
}

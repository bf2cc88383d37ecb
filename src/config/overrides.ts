/**
 * Persisted target/exclude overrides.
 *
 * The administrative surfaces write `<histDir>/sync-config.json`; on start the
 * file, when present and well-formed, replaces the environment defaults for
 * either list independently.
 */

import { z } from 'zod';
import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { FileOverrides } from '../types.js';

export const OVERRIDES_FILE_NAME = 'sync-config.json';

const FileOverridesSchema = z.object({
  targets: z.array(z.unknown()).optional(),
  excludes: z.array(z.unknown()).optional(),
});

export function overridesPath(histDir: string): string {
  return join(histDir, OVERRIDES_FILE_NAME);
}

/** Targets keep their trailing slash; only the leading one goes. */
export function normalizeTargets(values: readonly unknown[]): string[] {
  return values
    .map((value) => String(value))
    .filter((value) => value.trim() !== '')
    .map((value) => value.replace(/^\/+/, ''));
}

export function normalizeExcludes(values: readonly unknown[]): string[] {
  return values
    .map((value) => String(value))
    .filter((value) => value.trim() !== '')
    .map((value) => value.replace(/^\/+|\/+$/g, ''));
}

/**
 * Read the override file. A missing, unreadable or malformed file yields `{}`.
 * Empty lists are dropped so they never blank out the defaults.
 */
export function loadFileOverrides(histDir: string): FileOverrides {
  const path = overridesPath(histDir);
  if (!existsSync(path)) return {};

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    console.error(
      `Ignoring unreadable ${OVERRIDES_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return {};
  }

  const parsed = FileOverridesSchema.safeParse(data);
  if (!parsed.success) {
    console.error(`Ignoring malformed ${OVERRIDES_FILE_NAME}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return {};
  }

  const overrides: FileOverrides = {};
  if (parsed.data.targets) {
    const targets = normalizeTargets(parsed.data.targets);
    if (targets.length > 0) overrides.targets = targets;
  }
  if (parsed.data.excludes) {
    const excludes = normalizeExcludes(parsed.data.excludes);
    if (excludes.length > 0) overrides.excludes = excludes;
  }
  return overrides;
}

/** Write both lists to the override file, creating the history root if needed. */
export function saveFileOverrides(histDir: string, data: Required<FileOverrides>): void {
  mkdirSync(histDir, { recursive: true });
  writeFileSync(overridesPath(histDir), JSON.stringify(data, null, 2) + '\n');
}

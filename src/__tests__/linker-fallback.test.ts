/**
 * Fallback linking when a live directory cannot be replaced by a symlink.
 *
 * `node:fs` is partially mocked so that chosen paths refuse `symlinkSync` or
 * report themselves as read-only, whatever uid the tests run under.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, readdirSync, readFileSync, readlinkSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { makeTempRoots } from './helpers.js';
import { reconcileTarget } from '../link/index.js';

const fsFaults = vi.hoisted(() => ({
  symlink: new Map<string, Error>(),
  readOnly: new Set<string>(),
}));

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    symlinkSync: (...args: Parameters<typeof actual.symlinkSync>) => {
      const fault = fsFaults.symlink.get(String(args[1]));
      if (fault) throw fault;
      actual.symlinkSync(...args);
    },
    accessSync: (...args: Parameters<typeof actual.accessSync>) => {
      if (fsFaults.readOnly.has(String(args[0]))) throw errno('EACCES');
      actual.accessSync(...args);
    },
  };
});

function errno(code: string): Error {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

describe('fallback linking', () => {
  let root: string;
  let base: string;
  let hist: string;
  let live: string;
  let history: string;

  beforeEach(() => {
    ({ root, base, hist } = makeTempRoots('history-sync-fallback-'));
    live = join(base, 'data');
    history = join(hist, 'data');
    mkdirSync(live);
    writeFileSync(join(live, 'a.txt'), 'a');
    mkdirSync(history);
    writeFileSync(join(history, 'b.txt'), 'b');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fsFaults.symlink.clear();
    fsFaults.readOnly.clear();
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('should link children one by one when the directory link is refused', () => {
    fsFaults.symlink.set(live, errno('EACCES'));

    const report = reconcileTarget(base, hist, 'data/');

    expect(report).toMatchObject({ action: 'fallback', copied: 1 });
    expect(readdirSync(live).sort()).toEqual(['a.txt', 'b.txt']);
    expect(readlinkSync(join(live, 'a.txt'))).toBe(join(history, 'a.txt'));
    expect(readlinkSync(join(live, 'b.txt'))).toBe(join(history, 'b.txt'));
    expect(readFileSync(join(history, 'a.txt'), 'utf-8')).toBe('a');
  });

  it('should fall back on any error when the parent is not writable', () => {
    fsFaults.symlink.set(live, errno('EBUSY'));
    fsFaults.readOnly.add(dirname(live));

    expect(reconcileTarget(base, hist, 'data/').action).toBe('fallback');
    expect(readdirSync(live).sort()).toEqual(['a.txt', 'b.txt']);
  });

  it('should rethrow other errors when the parent is writable', () => {
    fsFaults.symlink.set(live, errno('EIO'));

    expect(() => reconcileTarget(base, hist, 'data/')).toThrow('EIO: simulated failure');
    expect(readFileSync(join(history, 'a.txt'), 'utf-8')).toBe('a');
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { makeTempRoots } from './helpers.js';
import { PLACEHOLDER_FILE_NAME, trackEmptyDirs } from '../link/index.js';

describe('trackEmptyDirs', () => {
  let root: string;
  let hist: string;

  beforeEach(() => {
    ({ root, hist } = makeTempRoots('history-sync-empty-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should write a placeholder into each empty directory exactly once', () => {
    mkdirSync(join(hist, 'data', 'empty1'), { recursive: true });
    mkdirSync(join(hist, 'data', 'nested', 'deeper'), { recursive: true });
    writeFileSync(join(hist, 'data', 'file.txt'), 'x');

    expect(trackEmptyDirs(hist, ['data/'], [])).toBe(2);
    expect(existsSync(join(hist, 'data', 'empty1', PLACEHOLDER_FILE_NAME))).toBe(true);
    expect(existsSync(join(hist, 'data', 'nested', 'deeper', PLACEHOLDER_FILE_NAME))).toBe(true);
    expect(existsSync(join(hist, 'data', 'nested', PLACEHOLDER_FILE_NAME))).toBe(false);

    expect(trackEmptyDirs(hist, ['data/'], [])).toBe(0);
  });

  it('should skip excluded subtrees', () => {
    mkdirSync(join(hist, 'data', 'cache', 'sub'), { recursive: true });
    mkdirSync(join(hist, 'data', 'kept'), { recursive: true });

    expect(trackEmptyDirs(hist, ['data/'], ['data/cache'])).toBe(1);
    expect(existsSync(join(hist, 'data', 'cache', 'sub', PLACEHOLDER_FILE_NAME))).toBe(false);
    expect(existsSync(join(hist, 'data', 'kept', PLACEHOLDER_FILE_NAME))).toBe(true);
  });

  it('should never write inside a .git directory', () => {
    mkdirSync(join(hist, 'data', '.git', 'refs'), { recursive: true });

    expect(trackEmptyDirs(hist, ['data/'], [])).toBe(0);
    expect(existsSync(join(hist, 'data', '.git', 'refs', PLACEHOLDER_FILE_NAME))).toBe(false);
  });

  it('should treat an empty target root as an empty directory', () => {
    mkdirSync(join(hist, 'data'));

    expect(trackEmptyDirs(hist, ['data/'], [])).toBe(1);
    expect(existsSync(join(hist, 'data', PLACEHOLDER_FILE_NAME))).toBe(true);
  });

  it('should ignore missing roots and file targets', () => {
    writeFileSync(join(hist, 'settings.json'), '{}');

    expect(trackEmptyDirs(hist, ['missing/', 'settings.json'], [])).toBe(0);
  });

  it('should not follow symlinked directories', () => {
    mkdirSync(join(root, 'elsewhere'));
    mkdirSync(join(hist, 'data'));
    symlinkSync(join(root, 'elsewhere'), join(hist, 'data', 'link'));

    expect(trackEmptyDirs(hist, ['data/'], [])).toBe(0);
    expect(existsSync(join(root, 'elsewhere', PLACEHOLDER_FILE_NAME))).toBe(false);
  });
});

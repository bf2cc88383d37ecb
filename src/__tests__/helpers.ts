import { vi } from 'vitest';
import { mkdtempSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { RawResult, VersionControl } from '../sync/vcs.js';
import type { AdminOperations, Settings, SyncStatus } from '../types.js';

/** Fresh temp directory with `base/` and `hist/` inside. */
export function makeTempRoots(prefix = 'history-sync-'): { root: string; base: string; hist: string } {
  const root = mkdtempSync(join(tmpdir(), prefix));
  const base = join(root, 'base');
  const hist = join(root, 'hist');
  mkdirSync(base);
  mkdirSync(hist);
  return { root, base, hist };
}

export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    base: '/',
    histDir: '/tmp/history-sync-hist',
    branch: 'main',
    githubRepo: 'example/history',
    githubPat: 'test-secret',
    remoteUrl: '',
    gitUserName: 'Test',
    gitUserEmail: 'test@test.com',
    targets: [],
    excludes: [],
    syncIntervalSec: 180,
    adminPort: 0,
    ...overrides,
  };
}

const OK: RawResult = { stdout: '', stderr: '', exitStatus: 0 };

/**
 * In-memory stand-in for the git facade. Records every call, keeps a local
 * and a remote head, and lets tests inject failures and raw results.
 */
export class FakeVcs implements VersionControl {
  calls: string[] = [];
  remoteEmpty = false;
  localHead = '';
  remoteHead = 'remote-1';
  /** Head adopted by fetchAndCheckout. */
  fetchedHead: (() => string) | null = null;
  /** Whether addAllAndCommitIfNeeded finds changes. */
  hasChanges = false;
  commits: string[] = [];
  excludeRules: string[] = [];
  remoteUrl = '';
  /** Errors thrown by the named method until removed. */
  failures = new Map<string, Error>();
  /** Errors thrown once by the named method. */
  failOnce = new Map<string, Error>();
  /** Results for runRaw, keyed by the joined argv. */
  rawResults = new Map<string, RawResult>();
  /** When set, `git pull` waits for this before returning. */
  pullGate: Promise<void> | null = null;

  private record(name: string): void {
    this.calls.push(name);
    const once = this.failOnce.get(name);
    if (once) {
      this.failOnce.delete(name);
      throw once;
    }
    const failure = this.failures.get(name);
    if (failure) throw failure;
  }

  count(name: string): number {
    return this.calls.filter((call) => call === name).length;
  }

  async ensureRepo(): Promise<void> {
    this.record('ensureRepo');
  }

  async setRemote(_path: string, url: string): Promise<void> {
    this.record('setRemote');
    this.remoteUrl = url;
  }

  async remoteIsEmpty(): Promise<boolean> {
    this.record('remoteIsEmpty');
    return this.remoteEmpty;
  }

  async initialCommitIfNeeded(): Promise<void> {
    this.record('initialCommitIfNeeded');
    if (!this.localHead) this.localHead = 'initial-1';
  }

  async fetchAndCheckout(): Promise<void> {
    this.record('fetchAndCheckout');
    this.localHead = this.fetchedHead ? this.fetchedHead() : this.remoteHead;
  }

  async push(): Promise<void> {
    this.record('push');
    this.remoteHead = this.localHead;
    this.remoteEmpty = false;
  }

  async addAllAndCommitIfNeeded(_path: string, message: string): Promise<boolean> {
    this.record('addAllAndCommitIfNeeded');
    if (!this.hasChanges) return false;
    this.commits.push(message);
    this.localHead = `commit-${this.commits.length}`;
    return true;
  }

  async runRaw(argv: readonly string[]): Promise<RawResult> {
    const key = argv.join(' ');
    this.record(key);
    if (key === 'git rev-parse HEAD') {
      return this.localHead ? { ...OK, stdout: this.localHead + '\n' } : { ...OK, exitStatus: 128 };
    }
    if (key.startsWith('git rev-parse origin/')) {
      return this.remoteHead ? { ...OK, stdout: this.remoteHead + '\n' } : { ...OK, exitStatus: 128 };
    }
    if (key.startsWith('git pull') && this.pullGate) {
      await this.pullGate;
    }
    return this.rawResults.get(key) ?? OK;
  }

  async installExcludeRules(_path: string, rules: readonly string[]): Promise<void> {
    this.record('installExcludeRules');
    this.excludeRules = [...rules];
  }
}

/** Poll until `condition` holds or `timeoutMs` passes. */
export async function waitUntil(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Timed out waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Status returned by {@link makeFakeOps}. */
export const STATUS: SyncStatus = {
  phase: 'sync_loop',
  base: '/',
  hist_dir: '/tmp/hist',
  branch: 'main',
  repo: 'example/history',
  targets: ['data/'],
  excludes: [],
  git_initialized: true,
  dirty: false,
  head: 'abc',
  remote_head: 'abc',
  last_activity_at: null,
};

/** Admin operations backed by `vi.fn` stubs that all succeed. */
export function makeFakeOps(overrides: Partial<AdminOperations> = {}): AdminOperations {
  return {
    status: vi.fn(async () => STATUS),
    initOnce: vi.fn(async () => ({ ok: true as const })),
    syncNow: vi.fn(async () => ({ ok: true as const })),
    pullOnly: vi.fn(async () => ({ ok: true as const })),
    pushOnly: vi.fn(async () => ({ ok: true as const })),
    relink: vi.fn(async () => ({ ok: true as const, links: [], written: 0 })),
    trackEmptyOnly: vi.fn(async () => ({ ok: true as const, written: 2 })),
    getTargets: vi.fn(() => ['data/']),
    setTargets: vi.fn(async (targets: string[]) => ({ ok: true as const, targets })),
    getExcludes: vi.fn((): string[] => []),
    setExcludes: vi.fn(async (excludes: string[]) => ({ ok: true as const, excludes })),
    ...overrides,
  };
}

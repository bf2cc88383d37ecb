/**
 * Sync orchestrator.
 *
 * Drives one process lifetime through
 *
 *   preparing_remote → aligning → linking → sync_loop
 *
 * with `stopped` reachable from every phase through `stop()`. Linking never
 * starts before local HEAD equals `origin/<branch>`, and the periodic loop
 * never starts before linking has succeeded once.
 *
 * Alignment is a plain hash comparison. A force-pushed remote makes the
 * fetch/reset step drop local-only commits.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { hasRemoteConfig, remoteLabel, remoteUrl } from '../config/settings.js';
import { normalizeExcludes, normalizeTargets, saveFileOverrides } from '../config/overrides.js';
import { migrateAndLink, precreateDirTargets, trackEmptyDirs } from '../link/index.js';
import { SyncLock } from './lock.js';
import { cancellableSleep } from './wait.js';
import type { VersionControl } from './vcs.js';
import type { AdminOperations, AdminResult, LinkReport, Settings, SyncPhase, SyncStatus } from '../types.js';

export const ALIGN_RETRY_MS = 3000;
export const INTERVAL_UNIT_MS = 1000;

export const COMMIT_MESSAGES = {
  initialLink: 'chore(sync): initial link & empty dirs',
  periodic: 'chore(sync): periodic commit',
  init: 'chore(sync): link and track empty dirs',
  relink: 'chore(sync): relink & empty',
  trackEmpty: (count: number) => `chore(sync): track empty (${count})`,
} as const;

export interface OrchestratorOptions {
  /** Delay between alignment (and linking) attempts. */
  retryDelayMs?: number;
  /** Length of one interval unit; `settings.syncIntervalSec` counts these. */
  unitMs?: number;
}

export class SyncOrchestrator implements AdminOperations {
  /** The single lock every git-touching path shares. */
  readonly lock = new SyncLock();

  private readonly settings: Settings;
  private readonly controller = new AbortController();
  private readonly retryDelayMs: number;
  private readonly unitMs: number;
  private currentPhase: SyncPhase = 'idle';
  private lastActivity: Date | null = null;

  constructor(
    settings: Settings,
    private readonly vcs: VersionControl,
    options: OrchestratorOptions = {},
  ) {
    this.settings = { ...settings, targets: [...settings.targets], excludes: [...settings.excludes] };
    this.retryDelayMs = options.retryDelayMs ?? ALIGN_RETRY_MS;
    this.unitMs = options.unitMs ?? INTERVAL_UNIT_MS;
  }

  get phase(): SyncPhase {
    return this.currentPhase;
  }

  get lastActivityAt(): Date | null {
    return this.lastActivity;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /** Request cancellation. Honored between operations, never mid-command. */
  stop(): void {
    this.controller.abort();
    this.currentPhase = 'stopped';
  }

  private setPhase(phase: SyncPhase): void {
    if (this.stopped) return;
    this.currentPhase = phase;
    console.error(`Sync phase: ${phase}`);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Run the whole lifecycle until `stop()`. Rejects when the local repo cannot
   * be prepared (missing remote settings, no git); later failures are logged
   * and retried.
   */
  async run(): Promise<void> {
    const signal = this.controller.signal;
    console.error('Starting sync orchestrator');

    this.setPhase('preparing_remote');
    await this.prepareRemote();

    this.setPhase('aligning');
    if (!(await this.alignWithRemote())) return;

    this.setPhase('linking');
    while (!signal.aborted) {
      try {
        await this.linkAndTrack();
        break;
      } catch (error) {
        console.error(`Linking failed: ${errorMessage(error)}`);
        await cancellableSleep(this.retryDelayMs, signal);
      }
    }

    this.setPhase('sync_loop');
    while (!signal.aborted) {
      try {
        await this.pullCommitPush();
      } catch (error) {
        console.error(`Periodic sync error: ${errorMessage(error)}`);
      }
      await cancellableSleep(this.settings.syncIntervalSec * this.unitMs, signal);
    }
    console.error('Sync orchestrator stopped');
  }

  /**
   * Ensure the local repo exists on the configured branch with exclude rules
   * and `origin` in place. Throws `ConfigurationError` without a remote.
   */
  async prepareRemote(): Promise<void> {
    if (!hasRemoteConfig(this.settings)) {
      throw new ConfigurationError('GITHUB_REPO/GITHUB_PAT (or GIT_REMOTE_URL) not configured');
    }
    const { histDir, branch, excludes } = this.settings;
    await this.lock.runExclusive(async () => {
      await this.vcs.ensureRepo(histDir, branch);
      await this.vcs.installExcludeRules(histDir, excludes);
      await this.vcs.setRemote(histDir, remoteUrl(this.settings));
    });
  }

  /**
   * Retry until local HEAD equals `origin/<branch>`. Never gives up on its
   * own; resolves false only when stopped.
   */
  async alignWithRemote(): Promise<boolean> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      try {
        if (await this.alignOnce()) {
          console.error(`Initial pull complete; HEAD matches origin/${this.settings.branch}`);
          return true;
        }
        console.error(`HEAD does not match origin/${this.settings.branch} yet, retrying`);
      } catch (error) {
        console.error(`Remote alignment failed: ${errorMessage(error)}`);
      }
      await cancellableSleep(this.retryDelayMs, signal);
    }
    return false;
  }

  /** One alignment attempt: seed an empty remote or adopt its tip, then compare hashes. */
  async alignOnce(): Promise<boolean> {
    const { histDir, branch } = this.settings;
    return this.lock.runExclusive(async () => {
      if (await this.vcs.remoteIsEmpty(histDir)) {
        console.error('Remote is empty: creating initial commit and pushing');
        await this.vcs.initialCommitIfNeeded(histDir);
        await this.vcs.push(histDir, branch);
      } else {
        await this.vcs.fetchAndCheckout(histDir, branch);
      }
      const { head, remoteHead } = await this.readHeads();
      return head !== '' && head === remoteHead;
    });
  }

  /** Must be called with the lock held. */
  private async readHeads(): Promise<{ head: string; remoteHead: string }> {
    const { histDir, branch } = this.settings;
    const local = await this.vcs.runRaw(['git', 'rev-parse', 'HEAD'], histDir);
    const remote = await this.vcs.runRaw(['git', 'rev-parse', `origin/${branch}`], histDir);
    return {
      head: local.exitStatus === 0 ? local.stdout.trim() : '',
      remoteHead: remote.exitStatus === 0 ? remote.stdout.trim() : '',
    };
  }

  /** Migrate and link every target. Does not take the lock. */
  private linkTargets(): LinkReport[] {
    const { base, histDir, targets } = this.settings;
    precreateDirTargets(histDir, targets);
    return migrateAndLink(base, histDir, targets);
  }

  /** Must be called with the lock held. Push failures propagate. */
  private async commitAndPush(message: string): Promise<boolean> {
    const { histDir, branch } = this.settings;
    const changed = await this.vcs.addAllAndCommitIfNeeded(histDir, message);
    if (changed) await this.vcs.push(histDir, branch);
    return changed;
  }

  /** The linking phase: link, track empty dirs, then commit and push once. */
  async linkAndTrack(): Promise<LinkReport[]> {
    const { histDir, branch, targets, excludes } = this.settings;
    const reports = this.linkTargets();
    const written = trackEmptyDirs(histDir, targets, excludes);
    if (written > 0) console.error(`Wrote ${written} placeholder(s) for empty directories`);

    await this.lock.runExclusive(async () => {
      const changed = await this.vcs.addAllAndCommitIfNeeded(histDir, COMMIT_MESSAGES.initialLink);
      if (!changed) return;
      try {
        await this.vcs.push(histDir, branch);
      } catch (error) {
        console.error(`Initial push failed (ignored): ${errorMessage(error)}`);
      }
    });
    return reports;
  }

  /**
   * One periodic cycle: `pull --rebase`, track empty dirs, commit if needed,
   * push. Pull and push failures are logged and left to the next cycle.
   */
  async pullCommitPush(): Promise<void> {
    const { histDir, branch, targets, excludes } = this.settings;
    await this.lock.runExclusive(async () => {
      const pulled = await this.vcs.runRaw(['git', 'pull', '--rebase', 'origin', branch], histDir);
      if (pulled.exitStatus !== 0) {
        console.error(`Pull failed (exit ${pulled.exitStatus}): ${pulled.stderr.trim()}`);
        // Leave the tree usable if the rebase stopped halfway; fails harmlessly otherwise.
        await this.vcs.runRaw(['git', 'rebase', '--abort'], histDir);
      }

      trackEmptyDirs(histDir, targets, excludes);
      const changed = await this.vcs.addAllAndCommitIfNeeded(histDir, COMMIT_MESSAGES.periodic);

      const pushed = await this.vcs.runRaw(['git', 'push', 'origin', branch], histDir);
      if (pushed.exitStatus !== 0) {
        console.error(`Push failed (exit ${pushed.exitStatus}): ${pushed.stderr.trim()}`);
      } else if (changed) {
        console.error('Committed and pushed changes');
      }
    });
    this.lastActivity = new Date();
  }

  // -------------------------------------------------------------------------
  // On-demand operations
  // -------------------------------------------------------------------------

  private async attempt<T extends object>(label: string, operation: () => Promise<T>): Promise<AdminResult<T>> {
    try {
      const value = await operation();
      return { ok: true as const, ...value };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`${label} failed: ${message}`);
      return { ok: false, error: message };
    }
  }

  async status(): Promise<SyncStatus> {
    const { base, histDir, branch, targets, excludes } = this.settings;
    const gitInitialized = existsSync(join(histDir, '.git'));

    let dirty = false;
    let head = '';
    let remoteHead = '';
    if (gitInitialized) {
      await this.lock.runExclusive(async () => {
        const porcelain = await this.vcs.runRaw(['git', 'status', '--porcelain'], histDir);
        dirty = porcelain.exitStatus === 0 && porcelain.stdout.trim() !== '';
        ({ head, remoteHead } = await this.readHeads());
      });
    }

    return {
      phase: this.currentPhase,
      base,
      hist_dir: histDir,
      branch,
      repo: remoteLabel(this.settings),
      targets: [...targets],
      excludes: [...excludes],
      git_initialized: gitInitialized,
      dirty,
      head,
      remote_head: remoteHead,
      last_activity_at: this.lastActivity ? this.lastActivity.toISOString() : null,
    };
  }

  /** Full one-shot setup: prepare, one alignment attempt, link, commit and push. */
  initOnce(): Promise<AdminResult> {
    return this.attempt('Init', async () => {
      await this.prepareRemote();
      if (!(await this.alignOnce())) {
        throw new Error(`Local HEAD does not match origin/${this.settings.branch}; not linking`);
      }
      this.linkTargets();
      const { histDir, targets, excludes } = this.settings;
      await this.lock.runExclusive(async () => {
        trackEmptyDirs(histDir, targets, excludes);
        await this.commitAndPush(COMMIT_MESSAGES.init);
      });
      return {};
    });
  }

  syncNow(): Promise<AdminResult> {
    return this.attempt('Sync', async () => {
      await this.pullCommitPush();
      return {};
    });
  }

  pullOnly(): Promise<AdminResult> {
    const { histDir, branch } = this.settings;
    return this.attempt('Pull', () =>
      this.lock.runExclusive(async () => {
        const result = await this.vcs.runRaw(['git', 'pull', '--rebase', 'origin', branch], histDir);
        if (result.exitStatus !== 0) {
          await this.vcs.runRaw(['git', 'rebase', '--abort'], histDir);
          throw new Error(result.stderr.trim() || `git pull exited with ${result.exitStatus}`);
        }
        return {};
      }),
    );
  }

  pushOnly(): Promise<AdminResult> {
    const { histDir, branch } = this.settings;
    return this.attempt('Push', () =>
      this.lock.runExclusive(async () => {
        const result = await this.vcs.runRaw(['git', 'push', 'origin', branch], histDir);
        if (result.exitStatus !== 0) {
          throw new Error(result.stderr.trim() || `git push exited with ${result.exitStatus}`);
        }
        return {};
      }),
    );
  }

  relink(): Promise<AdminResult<{ links: LinkReport[]; written: number }>> {
    return this.attempt('Relink', async () => {
      const links = this.linkTargets();
      const { histDir, targets, excludes } = this.settings;
      const written = await this.lock.runExclusive(async () => {
        const count = trackEmptyDirs(histDir, targets, excludes);
        await this.commitAndPush(COMMIT_MESSAGES.relink);
        return count;
      });
      return { links, written };
    });
  }

  trackEmptyOnly(): Promise<AdminResult<{ written: number }>> {
    const { histDir, targets, excludes } = this.settings;
    return this.attempt('Track empty', () =>
      this.lock.runExclusive(async () => {
        const written = trackEmptyDirs(histDir, targets, excludes);
        await this.commitAndPush(COMMIT_MESSAGES.trackEmpty(written));
        return { written };
      }),
    );
  }

  getTargets(): string[] {
    return [...this.settings.targets];
  }

  /** Persist new targets. They take effect on the next relink. */
  setTargets(targets: string[]): Promise<AdminResult<{ targets: string[] }>> {
    return this.attempt('Set targets', () =>
      this.lock.runExclusive(async () => {
        const normalized = normalizeTargets(targets);
        if (normalized.length === 0) throw new Error('At least one target is required');
        saveFileOverrides(this.settings.histDir, { targets: normalized, excludes: this.settings.excludes });
        this.settings.targets = normalized;
        return { targets: [...normalized] };
      }),
    );
  }

  getExcludes(): string[] {
    return [...this.settings.excludes];
  }

  /** Persist new excludes and reinstall them as ignore rules. */
  setExcludes(excludes: string[]): Promise<AdminResult<{ excludes: string[] }>> {
    return this.attempt('Set excludes', () =>
      this.lock.runExclusive(async () => {
        const normalized = normalizeExcludes(excludes);
        saveFileOverrides(this.settings.histDir, { targets: this.settings.targets, excludes: normalized });
        await this.vcs.installExcludeRules(this.settings.histDir, normalized);
        this.settings.excludes = normalized;
        return { excludes: [...normalized] };
      }),
    );
  }
}

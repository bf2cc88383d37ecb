// === Settings ===

/**
 * Runtime configuration. Built once at process start and handed to the
 * orchestrator; nothing below the entry point reads the environment.
 */
export interface Settings {
  /** Live filesystem root the targets are relative to. */
  base: string;
  /** Root of the git-tracked mirror. */
  histDir: string;
  branch: string;
  /** GitHub `owner/repo`. */
  githubRepo: string;
  githubPat: string;
  /** Explicit remote URL; takes precedence over the GitHub token URL. */
  remoteUrl: string;
  gitUserName: string;
  gitUserEmail: string;
  /** Base-relative paths. A trailing `/` marks a directory target. */
  targets: string[];
  /** History-relative paths or prefixes kept out of tracking. */
  excludes: string[];
  syncIntervalSec: number;
  adminPort: number;
}

/** Contents of `<histDir>/sync-config.json`. */
export interface FileOverrides {
  targets?: string[];
  excludes?: string[];
}

// === Linking ===

export const LINK_ACTIONS = [
  'unchanged',
  'relinked',
  'merged',
  'fallback',
  'moved',
  'discarded',
  'created',
] as const;

export type LinkAction = (typeof LINK_ACTIONS)[number];

export interface LinkReport {
  target: string;
  livePath: string;
  historyPath: string;
  action: LinkAction;
  /** Files copied into history by the merge step (directory targets only). */
  copied: number;
}

// === Orchestrator ===

export const SYNC_PHASES = [
  'idle',
  'preparing_remote',
  'aligning',
  'linking',
  'sync_loop',
  'stopped',
] as const;

export type SyncPhase = (typeof SYNC_PHASES)[number];

export interface SyncStatus {
  phase: SyncPhase;
  base: string;
  hist_dir: string;
  branch: string;
  repo: string;
  targets: string[];
  excludes: string[];
  git_initialized: boolean;
  dirty: boolean;
  head: string;
  remote_head: string;
  last_activity_at: string | null;
}

/** Outcome of an on-demand administrative operation. Never thrown. */
export type AdminResult<T extends object = Record<never, never>> =
  | ({ ok: true } & T)
  | { ok: false; error: string };

/**
 * Operations the administrative surfaces (HTTP, MCP) call into. The
 * orchestrator implements this; the core runs fine without any caller.
 */
export interface AdminOperations {
  status(): Promise<SyncStatus>;
  initOnce(): Promise<AdminResult>;
  syncNow(): Promise<AdminResult>;
  pullOnly(): Promise<AdminResult>;
  pushOnly(): Promise<AdminResult>;
  relink(): Promise<AdminResult<{ links: LinkReport[]; written: number }>>;
  trackEmptyOnly(): Promise<AdminResult<{ written: number }>>;
  getTargets(): string[];
  setTargets(targets: string[]): Promise<AdminResult<{ targets: string[] }>>;
  getExcludes(): string[];
  setExcludes(excludes: string[]): Promise<AdminResult<{ excludes: string[] }>>;
}

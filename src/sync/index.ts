/**
 * Sync layer. Keeps the history repo aligned with its remote.
 *
 * The orchestrator owns the lifecycle and the single git lock; the git CLI
 * facade does the version-control work.
 */

export { SyncOrchestrator, ALIGN_RETRY_MS, INTERVAL_UNIT_MS, COMMIT_MESSAGES } from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';
export { GitCli, renderExcludeFile, INITIAL_COMMIT_MESSAGE } from './git.js';
export type { GitIdentity } from './git.js';
export type { VersionControl, RawResult } from './vcs.js';
export { SyncLock } from './lock.js';
export { cancellableSleep } from './wait.js';

/**
 * In-process mutual exclusion for everything that reads or writes the history
 * repo's working tree or refs.
 *
 * One instance is owned by the orchestrator. The periodic loop and every
 * on-demand trigger must go through that same instance; a second lock would
 * let a manual push race a scheduled pull.
 */
export class SyncLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** True while a task holds the lock or is queued for it. */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  /** Run `task` once every earlier task has settled. Tasks never overlap. */
  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.holders++;
    const run = this.tail.then(() => task());
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run.finally(() => {
      this.holders--;
    });
  }
}

/** Result of a raw version-control command. A non-zero exit is not an error here. */
export interface RawResult {
  stdout: string;
  stderr: string;
  exitStatus: number;
}

/**
 * Version-control primitives the orchestrator drives. Every method except
 * `runRaw` rejects on failure.
 */
export interface VersionControl {
  /** Create the repo at `path` if needed, with `branch` as the initial branch. */
  ensureRepo(path: string, branch: string): Promise<void>;
  /** Point `origin` at `url`, adding it if absent. */
  setRemote(path: string, url: string): Promise<void>;
  /** True when `origin` has no branches. */
  remoteIsEmpty(path: string): Promise<boolean>;
  /** Create a first commit when the repo has none. */
  initialCommitIfNeeded(path: string): Promise<void>;
  /** Fetch `origin/<branch>` and reset the local branch to it. */
  fetchAndCheckout(path: string, branch: string): Promise<void>;
  push(path: string, branch: string): Promise<void>;
  /** Stage everything and commit if anything is staged. Returns whether a commit was made. */
  addAllAndCommitIfNeeded(path: string, message: string): Promise<boolean>;
  /** Run `argv[0]` with the remaining arguments in `cwd`. */
  runRaw(argv: readonly string[], cwd: string): Promise<RawResult>;
  /** Replace the managed ignore rules of the repo with `rules`. */
  installExcludeRules(path: string, rules: readonly string[]): Promise<void>;
}

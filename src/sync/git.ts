/**
 * Git CLI implementation of the version-control facade.
 *
 * SECURITY: All commands use execFile (not exec) so arguments never pass
 * through a shell. Remote URLs carrying a token are never logged.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { RawResult, VersionControl } from './vcs.js';

const execFileAsync = promisify(execFile);

const EXCLUDE_BEGIN = '# >>> history-sync excludes';
const EXCLUDE_END = '# <<< history-sync excludes';

export const INITIAL_COMMIT_MESSAGE = 'chore(sync): initial commit';

export interface GitIdentity {
  name: string;
  email: string;
}

/**
 * Rewrite the managed block of an exclude file, keeping every line outside it.
 * Each rule is anchored to the repo root.
 */
export function renderExcludeFile(existing: string, rules: readonly string[]): string {
  const kept: string[] = [];
  let inBlock = false;
  for (const line of existing.split('\n')) {
    if (line === EXCLUDE_BEGIN) {
      inBlock = true;
      continue;
    }
    if (line === EXCLUDE_END) {
      inBlock = false;
      continue;
    }
    if (!inBlock) kept.push(line);
  }
  while (kept.length > 0 && kept[kept.length - 1] === '') kept.pop();

  const block = [
    EXCLUDE_BEGIN,
    ...rules.map((rule) => '/' + rule.replace(/^\/+|\/+$/g, '')).filter((rule) => rule !== '/'),
    EXCLUDE_END,
  ];
  return [...kept, ...block].join('\n') + '\n';
}

export class GitCli implements VersionControl {
  constructor(private readonly identity?: GitIdentity) {}

  private async git(path: string, args: string[]): Promise<string> {
    const { stdout } = await execFileAsync('git', args, { cwd: path, encoding: 'utf-8' });
    return stdout;
  }

  private async succeeds(path: string, args: string[]): Promise<boolean> {
    const result = await this.runRaw(['git', ...args], path);
    return result.exitStatus === 0;
  }

  async ensureRepo(path: string, branch: string): Promise<void> {
    if (!existsSync(path)) {
      mkdirSync(path, { recursive: true });
    }
    if (!existsSync(join(path, '.git'))) {
      await this.git(path, ['init']);
      // Works on every git version, unlike `init -b`.
      await this.git(path, ['symbolic-ref', 'HEAD', `refs/heads/${branch}`]);
    }
    if (this.identity) {
      await this.git(path, ['config', 'user.name', this.identity.name]);
      await this.git(path, ['config', 'user.email', this.identity.email]);
    }
  }

  async setRemote(path: string, url: string, remote = 'origin'): Promise<void> {
    if (await this.succeeds(path, ['remote', 'get-url', remote])) {
      await this.git(path, ['remote', 'set-url', remote, url]);
    } else {
      await this.git(path, ['remote', 'add', remote, url]);
    }
  }

  async remoteIsEmpty(path: string, remote = 'origin'): Promise<boolean> {
    const refs = await this.git(path, ['ls-remote', '--heads', remote]);
    return refs.trim() === '';
  }

  async initialCommitIfNeeded(path: string): Promise<void> {
    if (await this.succeeds(path, ['rev-parse', '--verify', 'HEAD'])) return;
    await this.git(path, ['add', '-A']);
    await this.git(path, ['commit', '--allow-empty', '-m', INITIAL_COMMIT_MESSAGE]);
  }

  async fetchAndCheckout(path: string, branch: string, remote = 'origin'): Promise<void> {
    const tracking = `${remote}/${branch}`;
    await this.git(path, ['fetch', remote, branch]);
    // -f: files left by a previous run must not block adopting the remote tree.
    await this.git(path, ['checkout', '-f', '-B', branch, tracking]);
    await this.git(path, ['reset', '--hard', tracking]);
    await this.git(path, ['branch', `--set-upstream-to=${tracking}`, branch]);
  }

  async push(path: string, branch: string, remote = 'origin'): Promise<void> {
    await this.git(path, ['push', '-u', remote, branch]);
  }

  async addAllAndCommitIfNeeded(path: string, message: string): Promise<boolean> {
    await this.git(path, ['add', '-A']);
    // Exit code 1 means differences exist.
    if (await this.succeeds(path, ['diff', '--cached', '--quiet'])) return false;
    await this.git(path, ['commit', '-m', message]);
    return true;
  }

  runRaw(argv: readonly string[], cwd: string): Promise<RawResult> {
    const [command, ...args] = argv;
    if (!command) return Promise.reject(new Error('runRaw: empty command'));

    return new Promise((resolve, reject) => {
      execFile(command, args, { cwd, encoding: 'utf-8' }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitStatus: 0 });
          return;
        }
        // A numeric code is the exit status; anything else means it never ran.
        if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitStatus: error.code });
          return;
        }
        reject(error);
      });
    });
  }

  async installExcludeRules(path: string, rules: readonly string[]): Promise<void> {
    const infoDir = join(path, '.git', 'info');
    mkdirSync(infoDir, { recursive: true });
    const excludePath = join(infoDir, 'exclude');
    const existing = existsSync(excludePath) ? readFileSync(excludePath, 'utf-8') : '';
    writeFileSync(excludePath, renderExcludeFile(existing, rules));
  }
}

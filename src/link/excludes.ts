function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/**
 * Check a history-relative path against the exclude rules. A rule matches the
 * path itself and everything beneath it.
 */
export function isExcluded(relUnderHist: string, excludes: readonly string[]): boolean {
  const rel = trimSlashes(relUnderHist);
  for (const rule of excludes) {
    const prefix = trimSlashes(rule);
    if (!prefix) continue;
    if (rel === prefix || rel.startsWith(prefix + '/')) return true;
  }
  return false;
}

/** True if any component of the history-relative path is the git metadata dir. */
export function isInsideGitDir(relUnderHist: string): boolean {
  return `/${trimSlashes(relUnderHist)}/`.includes('/.git/');
}

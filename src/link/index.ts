/**
 * Link layer. Moves live targets into the history tree and links them back.
 */

export { toLiveAbsolute, toHistoryPath, isDirectoryTarget, stripTrailingSlash } from './paths.js';
export { isExcluded, isInsideGitDir } from './excludes.js';
export { mergeCopy } from './merge-copy.js';
export {
  ensureSymlink,
  linkDirContentsInPlace,
  precreateDirTargets,
  reconcileTarget,
  migrateAndLink,
} from './linker.js';
export { trackEmptyDirs, PLACEHOLDER_FILE_NAME } from './empty-dirs.js';

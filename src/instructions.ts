export const INSTRUCTIONS = `
# History Sync

This server mirrors live paths into a git-tracked history repository and keeps
it in sync with a remote. Each configured target is moved into the history
tree and replaced by a symlink, so writes land in the repo.

- **Inspect:** \`sync_status\` (phase, local/remote HEAD, dirty flag)
- **Act:** \`sync_run\` with an action: \`sync\`, \`pull\`, \`push\`, \`relink\`,
  \`track_empty\` or \`init\`
- **Configure:** \`sync_targets\`, \`sync_excludes\` (omit the list to read it)

Targets are relative to the base root; end a target with \`/\` to mark it as a
directory. Excludes are relative to the history root.

## Before changing anything

- Call \`sync_status\` first. When \`head\` and \`remote_head\` differ the
  daemon is still aligning; wait instead of relinking.
- Changed targets only take effect after \`sync_run\` with \`relink\`.
- On conflicts the history copy wins: a live file that collides with an
  existing history file is discarded.
`;

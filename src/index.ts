#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadSettings } from './config/settings.js';
import { ConfigurationError } from './errors.js';
import { GitCli, SyncOrchestrator } from './sync/index.js';
import { startAdminServer, stopAdminServer } from './admin/server.js';
import { createMcpServer } from './mcp.js';

// Parse CLI arguments
const args = process.argv.slice(2);
let adminPort: number | undefined;
let noAdmin = false;
let mcp = false;
let syncIntervalSec: number | undefined;

for (let i = 0; i < args.length; i++) {
  if (args[i] === '--admin-port' && args[i + 1]) {
    adminPort = parseInt(args[++i], 10);
  } else if (args[i] === '--no-admin') {
    noAdmin = true;
  } else if (args[i] === '--mcp') {
    mcp = true;
  } else if (args[i] === '--sync-interval' && args[i + 1]) {
    syncIntervalSec = parseInt(args[++i], 10);
  } else if (args[i] === '--help') {
    console.error(`
history-sync: mirror live paths into a git history repo through symlinks

Usage:
  history-sync [options]

Options:
  --admin-port <port>        Port for the admin API (default: SYNC_PORT or 5321)
  --no-admin                 Do not start the admin API
  --mcp                      Serve the admin operations as MCP tools on stdio
  --sync-interval <seconds>  Periodic sync interval (default: SYNC_INTERVAL or 180)
  --help                     Show this help message

Environment:
  BASE, HIST_DIR, GIT_BRANCH, GITHUB_REPO, GITHUB_PAT, GIT_REMOTE_URL,
  GIT_USER_NAME, GIT_USER_EMAIL, SYNC_TARGETS, EXCLUDE_PATHS, SYNC_INTERVAL, SYNC_PORT
`);
    process.exit(0);
  }
}

async function main(): Promise<void> {
  const settings = loadSettings();
  if (adminPort !== undefined && Number.isInteger(adminPort)) settings.adminPort = adminPort;
  if (syncIntervalSec !== undefined && syncIntervalSec > 0) settings.syncIntervalSec = syncIntervalSec;

  console.error(
    `Syncing ${settings.targets.length} target(s) from ${settings.base} into ${settings.histDir} ` +
    `(branch ${settings.branch}, every ${settings.syncIntervalSec}s)`,
  );

  const vcs = new GitCli({ name: settings.gitUserName, email: settings.gitUserEmail });
  const orchestrator = new SyncOrchestrator(settings, vcs);

  // Admin surfaces are optional; the orchestrator runs without them.
  if (!noAdmin) {
    try {
      await startAdminServer(orchestrator, settings.adminPort);
    } catch (error) {
      console.error(
        `Warning: Could not start admin API: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  if (mcp) {
    const server = createMcpServer(orchestrator);
    await server.connect(new StdioServerTransport());
    console.error('history-sync MCP server running on stdio');
  }

  // Clean shutdown
  const shutdown = async () => {
    orchestrator.stop();
    await stopAdminServer();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await orchestrator.run();
  await stopAdminServer();
}

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(2);
  }
  console.error('Fatal error:', error);
  process.exit(1);
});

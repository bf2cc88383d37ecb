import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AdminOperations, AdminResult } from '../types.js';

export const SYNC_ACTIONS = ['sync', 'pull', 'push', 'relink', 'track_empty', 'init'] as const;

export type SyncAction = (typeof SYNC_ACTIONS)[number];

function runAction(ops: AdminOperations, action: SyncAction): Promise<AdminResult<object>> {
  switch (action) {
    case 'sync':
      return ops.syncNow();
    case 'pull':
      return ops.pullOnly();
    case 'push':
      return ops.pushOnly();
    case 'relink':
      return ops.relink();
    case 'track_empty':
      return ops.trackEmptyOnly();
    case 'init':
      return ops.initOnce();
  }
}

export function registerSyncRunTool(server: McpServer, ops: AdminOperations): void {
  server.registerTool(
    'sync_run',
    {
      description:
        'Run a sync operation on the history repository now. ' +
        '"sync" does pull --rebase, placeholder tracking, commit and push. ' +
        '"pull" and "push" do only that step. ' +
        '"relink" migrates every target into history again and links it back. ' +
        '"track_empty" writes .gitkeep files into empty directories. ' +
        '"init" runs the full one-shot setup against the remote. ' +
        'Operations wait for any sync already running.',
      inputSchema: {
        action: z
          .enum(SYNC_ACTIONS)
          .optional()
          .describe('Operation to run (default: sync)'),
      },
    },
    async ({ action }) => {
      const chosen = action ?? 'sync';
      const result = await runAction(ops, chosen);
      if (!result.ok) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error running ${chosen}: ${result.error}`,
            },
          ],
          isError: true,
        };
      }
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify({ action: chosen, ...result }),
          },
        ],
      };
    },
  );
}

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AdminOperations, AdminResult } from '../types.js';

function toToolResult(name: string, result: AdminResult<object>) {
  if (!result.ok) {
    return {
      content: [{ type: 'text' as const, text: `Error updating ${name}: ${result.error}` }],
      isError: true,
    };
  }
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result) }],
  };
}

export function registerTargetsTool(server: McpServer, ops: AdminOperations): void {
  server.registerTool(
    'sync_targets',
    {
      description:
        'Read or replace the list of synced targets. Targets are relative to the base root; ' +
        'a trailing "/" marks a directory. The list is saved to sync-config.json in the ' +
        'history root and applies from the next relink. Omit "targets" to read the list.',
      inputSchema: {
        targets: z
          .array(z.string())
          .optional()
          .describe('New target list; replaces the current one'),
      },
    },
    async ({ targets }) => {
      if (!targets) {
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ targets: ops.getTargets() }) }],
        };
      }
      return toToolResult('targets', await ops.setTargets(targets));
    },
  );
}

export function registerExcludesTool(server: McpServer, ops: AdminOperations): void {
  server.registerTool(
    'sync_excludes',
    {
      description:
        'Read or replace the exclude list. Excludes are paths or prefixes relative to the ' +
        'history root; they are kept out of git and out of empty-directory tracking. ' +
        'Saving reinstalls the git ignore rules immediately. Omit "excludes" to read the list.',
      inputSchema: {
        excludes: z
          .array(z.string())
          .optional()
          .describe('New exclude list; replaces the current one'),
      },
    },
    async ({ excludes }) => {
      if (!excludes) {
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ excludes: ops.getExcludes() }) }],
        };
      }
      return toToolResult('excludes', await ops.setExcludes(excludes));
    },
  );
}

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AdminOperations } from '../types.js';

export function registerStatusTool(server: McpServer, ops: AdminOperations): void {
  server.registerTool(
    'sync_status',
    {
      description:
        'Show the sync state: current phase, base and history roots, branch, targets, ' +
        'excludes, whether the working tree is dirty, and the local and remote HEAD hashes. ' +
        'Equal hashes mean the history repo is aligned with the remote.',
      inputSchema: {},
    },
    async () => {
      try {
        const status = await ops.status();
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(status),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error reading sync status: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}

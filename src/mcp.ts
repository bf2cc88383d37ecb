import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { INSTRUCTIONS } from './instructions.js';
import { registerStatusTool } from './tools/status.js';
import { registerSyncRunTool } from './tools/sync.js';
import { registerTargetsTool, registerExcludesTool } from './tools/targets.js';
import type { AdminOperations } from './types.js';

export const SERVER_NAME = 'history-sync';
export const SERVER_VERSION = '0.3.0';

/** MCP server exposing the administrative operations as tools. */
export function createMcpServer(ops: AdminOperations): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS },
  );

  registerStatusTool(server, ops);
  registerSyncRunTool(server, ops);
  registerTargetsTool(server, ops);
  registerExcludesTool(server, ops);

  return server;
}

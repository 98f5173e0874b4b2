/**
 * hoststate — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { StateManager } from '../engine/state-manager.js';
import { registerManageStateTool } from './tools/manage-state.js';
import { registerStateCacheTool } from './tools/state-cache.js';
import { registerResources } from './resources.js';

export const SERVER_VERSION = '0.3.0';

/**
 * Create a fully configured MCP server with all hoststate tools and resources.
 *
 * @param manager - State manager bound to one host's state file
 */
export function createMcpServer(manager: StateManager): McpServer {
  const server = new McpServer({
    name: 'hoststate',
    version: SERVER_VERSION,
  });

  registerManageStateTool(server, manager);
  registerStateCacheTool(server, manager);

  registerResources(server, manager);

  return server;
}

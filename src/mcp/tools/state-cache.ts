/**
 * hoststate — MCP state_cache tool
 *
 * Inspect or drop the in-process scan cache. Never touches the state file.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { SCAN_CATEGORIES } from '../../types/state.js';
import type { StateManager } from '../../engine/state-manager.js';
import { jsonResult } from './manage-state.js';

export function registerStateCacheTool(server: McpServer, manager: StateManager): void {
  server.tool(
    'state_cache',
    'Inspect (status) or clear (invalidate) cached scan results per category',
    {
      action: z.enum(['status', 'invalidate']),
      category: z
        .enum(SCAN_CATEGORIES)
        .optional()
        .describe('Category to invalidate; all categories when omitted'),
    },
    async ({ action, category }) => {
      if (action === 'invalidate') {
        manager.invalidateCache(category);
        return jsonResult({
          action,
          message: category ? `Cache for ${category} invalidated` : 'All cached scans invalidated',
        });
      }
      return jsonResult({ action, ...manager.cacheStatus() });
    },
  );
}

/**
 * hoststate — MCP manage_state tool
 *
 * Single 'manage_state' tool with an 'action' parameter.
 *
 * Actions: load, save, update, compare, export, import, diff, watch
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { STATE_ACTIONS } from '../../types/state.js';
import { executeStateRequest } from '../../engine/request.js';
import type { StateRequest } from '../../engine/request.js';
import type { StateManager } from '../../engine/state-manager.js';

export function jsonResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function registerManageStateTool(server: McpServer, manager: StateManager): void {
  server.tool(
    'manage_state',
    'Manage persistent host state. Actions: load (cached state), save (scan and persist), ' +
      'update (set one field), compare (detect drift against a fresh scan), export, ' +
      'import (replace stored state), diff (against a supplied document), watch (value at a path)',
    {
      action: z.enum(STATE_ACTIONS),
      path: z
        .string()
        .optional()
        .describe("Dotted field path for update/watch (e.g. 'system.hostname')"),
      value: z.unknown().optional().describe('New value for update (any JSON value)'),
      valueJson: z
        .string()
        .optional()
        .describe('New value for update as a JSON string (alternative to value)'),
      force_scan: z
        .boolean()
        .optional()
        .describe('save: rescan every category even if cached results are still fresh'),
      document: z
        .union([z.string(), z.record(z.string(), z.unknown())])
        .optional()
        .describe('State document (JSON text or object) for import/diff'),
      timeout_ms: z
        .number()
        .int()
        .positive()
        .optional()
        .describe('Scan timeout for save/compare in milliseconds'),
    },
    async ({ action, path, value, valueJson, force_scan, document, timeout_ms }, extra) => {
      // Parse valueJson string into a value when provided
      let updateValue: unknown = value;
      if (valueJson !== undefined) {
        try {
          updateValue = JSON.parse(valueJson);
        } catch {
          return jsonResult(
            {
              error: {
                code: 'INCOMPATIBLE_VALUE',
                message: `Invalid JSON in valueJson: ${valueJson}`,
                action,
              },
            },
            true,
          );
        }
      }

      const request: StateRequest = {
        action,
        ...(path !== undefined ? { path } : {}),
        ...(updateValue !== undefined ? { value: updateValue } : {}),
        ...(force_scan !== undefined ? { force_scan } : {}),
        ...(document !== undefined ? { document } : {}),
        ...(timeout_ms !== undefined ? { timeout_ms } : {}),
        signal: extra.signal,
      };

      const response = await executeStateRequest(manager, request);
      if (!response.ok) {
        return jsonResult({ error: response.error }, true);
      }
      return jsonResult({ action: response.action, message: response.message, ...response.data });
    },
  );
}

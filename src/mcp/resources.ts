/**
 * hoststate — MCP Resources
 *
 * Read-only views of the stored state and of the engine's schema.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DOCUMENT_SECTIONS } from '../types/state.js';
import { toErrorPayload } from '../types/errors.js';
import { toSerialized } from '../db/document.js';
import { CURRENT_SCHEMA_VERSION, KNOWN_VERSIONS } from '../db/migrations/index.js';
import type { StateManager } from '../engine/state-manager.js';

export function registerResources(server: McpServer, manager: StateManager): void {
  // 1. hoststate://state — stored document (null when nothing has been saved)
  server.resource(
    'state',
    'hoststate://state',
    { description: 'The stored state document, exactly as persisted (null if never saved)' },
    async (uri) => {
      let body: unknown;
      try {
        const result = await manager.load();
        body = result.status === 'loaded' ? toSerialized(result.document) : null;
      } catch (err) {
        body = { error: toErrorPayload(err) };
      }
      return {
        contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(body, null, 2) }],
      };
    },
  );

  // 2. hoststate://schema — versions, sections, scan categories and TTLs
  server.resource(
    'schema',
    'hoststate://schema',
    { description: 'Current schema version, readable versions, sections and cache TTLs' },
    async (uri) => {
      const { entries } = manager.cacheStatus();
      const body = {
        schema_version: CURRENT_SCHEMA_VERSION,
        readable_versions: KNOWN_VERSIONS,
        sections: DOCUMENT_SECTIONS,
        scanned_categories: manager.scannedCategories,
        ttl_ms: Object.fromEntries(entries.map((e) => [e.category, e.ttlMs])),
        state_file: manager.stateFile,
      };
      return {
        contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(body, null, 2) }],
      };
    },
  );
}

#!/usr/bin/env node
/**
 * hoststate — persistent host state and drift detection
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで LLM Agent と接続する。
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { StateStore } from './db/state-store.js';
import { ScanCache } from './engine/scan-cache.js';
import { StateManager } from './engine/state-manager.js';
import { CommandObserver } from './observer/command-observer.js';
import { ShellCommandExecutor } from './observer/shell-executor.js';
import { createMcpServer } from './mcp/server.js';

const config = loadConfig();
const logger = createLogger('server', config.logLevel);

const manager = new StateManager({
  store: new StateStore(config.stateFile, {
    lockTimeoutMs: config.lockTimeoutMs,
    staleLockMs: config.staleLockMs,
    logger: logger.child('store'),
  }),
  cache: new ScanCache({ ttls: config.ttls }),
  observer: new CommandObserver(new ShellCommandExecutor(config.sshTarget), {
    romRoot: config.romRoot,
    logger: logger.child('observer'),
  }),
  categories: config.categories,
  scanTimeoutMs: config.scanTimeoutMs,
  logger: logger.child('state'),
});

const server = createMcpServer(manager);
const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('hoststate MCP server ready', {
  host: config.host,
  stateFile: config.stateFile,
  remote: config.sshTarget !== undefined,
});

#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { closeDb, currentDbPath, getDb } from './db/connection.js';
import { USAGE, parseArgs, resolveConfig, type AppConfig } from './config.js';
import { INSTRUCTIONS } from './instructions.js';
import { createDefaultRegistry } from './providers/registry.js';
import { SyncManager } from './sync/index.js';
import type { ToolContext } from './tools/context.js';
import { registerSaveTool } from './tools/save.js';
import { registerGetTool } from './tools/get.js';
import { registerListTools } from './tools/list.js';
import { registerDeleteTools } from './tools/delete.js';
import { registerLabelsTool } from './tools/labels.js';
import { registerProviderTools } from './tools/providers.js';
import { registerSyncTools } from './tools/sync.js';
import { registerLinkTools } from './tools/links.js';
import { registerTransferTools } from './tools/transfer.js';

let config: AppConfig;
try {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.error(USAGE);
    process.exit(0);
  }
  config = resolveConfig(args);
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  console.error(USAGE);
  process.exit(1);
}

async function main(): Promise<void> {
  getDb(config.dbPath);
  console.error(`Database: ${currentDbPath() ?? 'not open'}`);

  const manager = new SyncManager({
    registry: createDefaultRegistry(),
    primaryIntervalMinutes: config.syncInterval,
    backupIntervalMinutes: config.backupInterval,
  });

  manager.events.subscribe((status, message, provider) => {
    console.error(`[${provider}] ${status}: ${message}`);
  });

  // Saved connections first, then whatever the config file names on top
  const restored = await manager.restore(config.secrets);
  for (const result of restored) {
    if (!result.ok) {
      console.error(`Warning: could not restore ${result.provider}: ${result.message}`);
    }
  }
  for (const { provider, credentials } of config.connections) {
    const result = await manager.connect(provider, credentials);
    if (!result.ok) {
      console.error(`Warning: could not connect ${provider}: ${result.message}`);
    }
  }

  if (config.autoSync) {
    const started = manager.startConfiguredSchedules();
    if (started.length > 0) {
      console.error(`Auto sync: ${started.map((name) => `${name} every ${manager.intervalFor(name)}m`).join(', ')}`);
    }
  }

  const server = new McpServer(
    { name: 'keepsync-notes', version: '1.0.0' },
    { instructions: INSTRUCTIONS },
  );

  const ctx: ToolContext = { manager, secrets: config.secrets, autoSync: config.autoSync };

  registerSaveTool(server);
  registerGetTool(server);
  registerListTools(server);
  registerDeleteTools(server);
  registerLabelsTool(server);
  registerProviderTools(server, ctx);
  registerSyncTools(server, ctx);
  registerLinkTools(server, ctx);
  registerTransferTools(server);

  // Clean shutdown
  const shutdown = () => {
    manager.shutdown();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('keepsync-notes server running on stdio');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

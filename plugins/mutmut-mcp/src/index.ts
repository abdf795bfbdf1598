#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/loader.js';
import { createServerContext, createMcpServer } from './server.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile, executable: config.executable }, 'Configuration loaded');

  const ctx = createServerContext(config);
  const server = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.names(), cwd: process.cwd() }, 'mutmut-mcp server running on stdio');
}

main().catch((err) => {
  logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Fatal startup error');
  process.exit(1);
});

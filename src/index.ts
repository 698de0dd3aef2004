#!/usr/bin/env node
/**
 * Biolink Resolver MCP Server - Entry Point
 *
 * Resolves biological entity names to identifiers and their most specific
 * Biolink types. Serves over stdio by default, or streamable HTTP.
 */

import { loadConfig } from './config.js';
import { createServerContext } from './context.js';
import { startHttpServer } from './http.js';
import { createLogger } from './logger.js';
import { startStdioServer } from './server.js';
import { getTaxonomy } from './taxonomy/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logging.level);

  const model = await getTaxonomy(config.taxonomy, { logger: logger.child('taxonomy') });
  const context = createServerContext(config, model, { logger });

  if (config.server.transport === 'http') {
    await startHttpServer(context);
  } else {
    await startStdioServer(context);
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error instanceof Error ? error.message : error);
  process.exit(1);
});

#!/usr/bin/env node

/**
 * Form Processor MCP Server
 *
 * Main entry point - loads the data store and form definitions, then
 * starts the MCP server
 */

import { FormController } from './controller/form-controller.js';
import { InMemoryDataAccess } from './model/memory-data-access.js';
import type { DataAccess } from './model/types.js';
import { loadFormDefinitions, registerDefinitions } from './server/form-loader.js';
import { FormProcessorServer } from './server/mcp-server.js';
import { initServerConfig } from './server/server-config.js';
import { initializeFormTools } from './tools/index.js';
import { getLogger } from './shared/services/logging.service.js';

/**
 * Initialize all services and handlers
 */
async function initializeServer(): Promise<FormProcessorServer> {
  // Step 1: Configuration
  const config = initServerConfig(process.argv.slice(2));
  const logger = getLogger();
  logger.setMinLevel(config.logLevel);

  // Step 2: Data store
  let dataAccess: DataAccess | undefined;
  if (config.dataFile) {
    dataAccess = await InMemoryDataAccess.fromFile(config.dataFile);
    logger.info('Data store loaded', { dataFile: config.dataFile });
  }

  // Step 3: Forms
  const definitions = await loadFormDefinitions(config.formsDir);
  const controller = registerDefinitions(new FormController(), definitions, dataAccess);

  // Step 4: Tools
  initializeFormTools(controller);

  // Step 5: Server
  return new FormProcessorServer({
    name: 'form-processor-mcp-server',
    version: '1.0.0',
    capabilities: {
      tools: {},
      logging: {},
    },
  });
}

/**
 * Main function
 */
async function main(): Promise<void> {
  const server = await initializeServer();
  await server.start();

  const shutdown = (signal: string): void => {
    getLogger().info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        getLogger().error('Error during shutdown', error instanceof Error ? error : undefined);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  getLogger().critical('Failed to start server', error instanceof Error ? error : undefined);
  process.exitCode = 1;
});

#!/usr/bin/env node

/**
 * sriov-state-mcp entry point
 */

import { getConfig } from './config/index.js';
import { ConfigurationError } from './errors/index.js';
import { getLogger } from './logger/index.js';
import { SriovStateMCPServer } from './server.js';

async function main(): Promise<void> {
  const config = getConfig();
  const logger = getLogger(config.logging);

  logger.info('Starting sriov-state MCP server', {
    version: config.mcp.serverVersion,
    nodeEnv: config.server.nodeEnv,
  });

  const server = new SriovStateMCPServer(config, logger);
  await server.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error('Configuration error:', error.message);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});

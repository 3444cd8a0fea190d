#!/usr/bin/env node

/**
 * OutputCheck - MCP Server Entry Point
 *
 * Schema-driven validation of machine-generated content, with an optional
 * semantic quality pass.
 */

import { OutputCheckServer } from './server.js';
import { logger } from './utils/logger.js';

// Track server instance for cleanup on fatal errors
let serverInstance: OutputCheckServer | null = null;

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down OutputCheck', { signal });
  try {
    await serverInstance?.stop();
  } catch (error) {
    logger.error('Error during shutdown', error);
  }
  process.exit(0);
}

async function main(): Promise<void> {
  const server = new OutputCheckServer();
  serverInstance = server;

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.start();
}

main().catch(async (error: unknown) => {
  logger.error('Fatal error', error);

  if (serverInstance) {
    try {
      await serverInstance.stop();
    } catch (cleanupError) {
      logger.error('Error during cleanup', cleanupError);
    }
  }

  process.exit(1);
});

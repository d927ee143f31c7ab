#!/usr/bin/env tsx
/**
 * Inference Gateway Entry Point
 */

import 'dotenv/config';
import { getServerConfig } from '@modelledger/utils';
import { logger } from '../logger.js';
import { startGateway } from '../server.js';

async function main(): Promise<void> {
  const server = await startGateway(getServerConfig());

  const shutdown = (signal: string): void => {
    logger.info('Shutting down inference gateway', { signal });
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error('Failed to start inference gateway', error);
  process.exit(1);
});

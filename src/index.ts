import 'dotenv/config';

import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { initRedis, closeRedis } from './queues/redis.js';
import { initBulkRunQueue, closeBulkRunQueue } from './queues/bulk-run.queue.js';
import { buildApp } from './app.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info({ env: config.server.env }, 'Starting feedframe API');

  // Initialize connections
  await initDatabase();
  initRedis();
  initBulkRunQueue();

  // Build and start server
  const app = await buildApp();

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
    logger.info(`Documentation available at http://localhost:${config.server.port}/docs`);
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await closeBulkRunQueue();
      await closeRedis();
      await closeDatabase();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});

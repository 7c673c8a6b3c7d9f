import 'dotenv/config';
import http from 'node:http';

import { parseEnv } from '../config/env.js';
import { getConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import { initDatabase, closeDatabase } from '../db/index.js';
import { initRedis, closeRedis } from '../queues/redis.js';
import { startBulkRunWorker, stopBulkRunWorker } from './bulk-run.worker.js';

// Simple health check server for container orchestration
let healthServer: http.Server | null = null;

/**
 * Start a simple HTTP server for health checks
 */
function startHealthServer(port: number): void {
  healthServer = http.createServer((req, res) => {
    if (req.url === '/health' && req.method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', service: 'worker' }));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  healthServer.listen(port, () => {
    getLogger().info({ port }, 'Worker health server started');
  });
}

/**
 * Stop the health server
 */
async function stopHealthServer(): Promise<void> {
  return new Promise((resolve) => {
    if (healthServer) {
      healthServer.close(() => resolve());
    } else {
      resolve();
    }
  });
}

/**
 * Worker entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info({ env: config.server.env }, 'Starting feedframe worker');

  await initDatabase();
  initRedis();

  startBulkRunWorker();

  const healthPort = config.server.port;
  startHealthServer(healthPort);

  logger.info(
    { concurrency: config.worker.concurrency, bulkConcurrency: config.bulk.concurrency, healthPort },
    'Worker started successfully'
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopHealthServer();
      await stopBulkRunWorker();
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
  // Use stderr for fatal errors before/after logger availability
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exit(1);
});

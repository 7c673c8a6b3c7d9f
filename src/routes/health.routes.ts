import type { FastifyInstance } from 'fastify';
import { getPool } from '../db/index.js';
import { pingRedis } from '../queues/redis.js';
import { getBulkRunQueueCounts, type QueueCounts } from '../queues/bulk-run.queue.js';
import { storageService } from '../services/storage.service.js';
import { metricsService, type ServiceMetrics } from '../services/metrics.service.js';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createChildLogger({ service: 'health' });

type CheckStatus = 'ok' | 'error';

interface HealthResponse {
  status: CheckStatus;
  timestamp: string;
}

interface StorageHealthResponse extends HealthResponse {
  error?: string;
}

interface QueueHealthResponse extends HealthResponse {
  counts?: QueueCounts;
  error?: string;
}

interface MetricsResponse extends HealthResponse {
  metrics?: ServiceMetrics;
  error?: string;
}

interface ReadinessResponse extends HealthResponse {
  checks: {
    database: CheckStatus;
    redis: CheckStatus;
  };
}

const checkProperties = {
  status: { type: 'string' },
  timestamp: { type: 'string' },
  error: { type: 'string' },
} as const;

async function checkDatabase(): Promise<CheckStatus> {
  const pool = getPool();
  if (!pool) {
    return 'error';
  }
  try {
    await pool.query('SELECT 1');
    return 'ok';
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Database readiness check failed');
    return 'error';
  }
}

async function checkRedis(): Promise<CheckStatus> {
  try {
    return (await pingRedis()) ? 'ok' : 'error';
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Redis readiness check failed');
    return 'error';
  }
}

/**
 * Health check routes (no auth required)
 */
export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * Liveness probe - is the service running?
   */
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        description: 'Liveness probe',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
      });
    }
  );

  /**
   * Blob storage probe
   */
  fastify.get<{ Reply: StorageHealthResponse }>(
    '/health/storage',
    {
      schema: {
        description: 'Checks that the storage bucket is reachable',
        tags: ['Health'],
        response: {
          200: { type: 'object', properties: checkProperties },
          503: { type: 'object', properties: checkProperties },
        },
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString();
      try {
        await storageService.ping();
        return reply.send({ status: 'ok', timestamp });
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Storage health check failed');
        return reply.status(503).send({ status: 'error', timestamp, error: errorMessage(error) });
      }
    }
  );

  /**
   * Task queue probe
   */
  fastify.get<{ Reply: QueueHealthResponse }>(
    '/health/queue',
    {
      schema: {
        description: 'Checks the bulk run queue and reports job counts',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              ...checkProperties,
              counts: {
                type: 'object',
                properties: {
                  waiting: { type: 'number' },
                  active: { type: 'number' },
                  failed: { type: 'number' },
                },
              },
            },
          },
          503: { type: 'object', properties: checkProperties },
        },
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString();
      try {
        const counts = await getBulkRunQueueCounts();
        return reply.send({ status: 'ok', timestamp, counts });
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Queue health check failed');
        return reply.status(503).send({ status: 'error', timestamp, error: errorMessage(error) });
      }
    }
  );

  /**
   * Service metrics: projects and outputs by status, queue depth
   */
  fastify.get<{ Reply: MetricsResponse }>(
    '/health/metrics',
    {
      schema: {
        description: 'Reports project and output counts by status and the bulk run queue depth',
        tags: ['Health'],
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString();
      try {
        const metrics = await metricsService.collect();
        return reply.send({ status: 'ok', timestamp, metrics });
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Metrics collection failed');
        return reply.status(503).send({ status: 'error', timestamp, error: errorMessage(error) });
      }
    }
  );

  /**
   * Readiness probe - can the service handle requests?
   */
  fastify.get<{ Reply: ReadinessResponse }>(
    '/ready',
    {
      schema: {
        description: 'Readiness probe - checks database and Redis connectivity',
        tags: ['Health'],
      },
    },
    async (_request, reply) => {
      const [database, redis] = await Promise.all([checkDatabase(), checkRedis()]);

      const allOk = database === 'ok' && redis === 'ok';
      const statusCode = allOk ? 200 : 503;

      return reply.status(statusCode).send({
        status: allOk ? 'ok' : 'error',
        timestamp: new Date().toISOString(),
        checks: { database, redis },
      });
    }
  );
}

import { Redis } from 'ioredis';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'redis' });

const MAX_CONNECT_RETRIES = 10;

let redis: Redis | null = null;

/**
 * Initialize Redis connection
 */
export function initRedis(): Redis {
  if (redis) {
    return redis;
  }

  const config = getConfig();

  redis = new Redis(config.redis.url, {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: true,
    retryStrategy: (times: number) => {
      if (times > MAX_CONNECT_RETRIES) {
        logger.error({ attempts: times }, 'Redis connection failed, giving up');
        return null;
      }
      return Math.min(times * 100, 3000);
    },
  });

  redis.on('connect', () => {
    logger.info('Redis connection established');
  });

  redis.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Redis connection error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  return redis;
}

/**
 * Get Redis instance (must be initialized first)
 */
export function getRedis(): Redis | null {
  return redis;
}

/**
 * Round-trip check for the readiness probe
 */
export async function pingRedis(): Promise<boolean> {
  if (!redis) {
    return false;
  }
  return (await redis.ping()) === 'PONG';
}

/**
 * Close Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
    logger.info('Redis connection closed');
  }
}

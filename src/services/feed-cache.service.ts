import { createHash } from 'crypto';
import { getRedis } from '../queues/redis.js';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { productRecordSchema, type ProductRecord } from '../types/project.types.js';

const logger = createChildLogger({ service: 'feed-cache' });

const FIRST_PRODUCT_PREFIX = 'feed:first:';

/**
 * The Redis commands the cache needs
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

export function firstProductKey(feedUrl: string): string {
  return `${FIRST_PRODUCT_PREFIX}${createHash('sha256').update(feedUrl).digest('hex')}`;
}

/**
 * Feed Cache Service
 * Keeps the first product of a feed for preview requests. Bulk runs always
 * fetch the feed. Cache errors are logged and treated as a miss.
 */
export class FeedCacheService {
  constructor(
    private readonly store: () => CacheStore | null = getRedis,
    private readonly ttlSeconds?: number
  ) {}

  private ttl(): number {
    return this.ttlSeconds ?? getConfig().fetch.feedCacheTtlSeconds;
  }

  async getFirstProduct(feedUrl: string): Promise<ProductRecord | null> {
    const store = this.store();
    if (!store || this.ttl() === 0) {
      return null;
    }

    let cached: string | null;
    try {
      cached = await store.get(firstProductKey(feedUrl));
    } catch (error) {
      logger.warn({ feedUrl, error: errorMessage(error) }, 'Feed cache read failed');
      return null;
    }
    if (!cached) {
      return null;
    }

    let value: unknown;
    try {
      value = JSON.parse(cached);
    } catch {
      logger.warn({ feedUrl }, 'Discarding unreadable feed cache entry');
      return null;
    }
    const parsed = productRecordSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn({ feedUrl }, 'Discarding unreadable feed cache entry');
      return null;
    }

    logger.debug({ feedUrl }, 'Using cached first product');
    return parsed.data;
  }

  async setFirstProduct(feedUrl: string, record: ProductRecord): Promise<void> {
    const store = this.store();
    if (!store || this.ttl() === 0) {
      return;
    }

    try {
      await store.setex(firstProductKey(feedUrl), this.ttl(), JSON.stringify(record));
    } catch (error) {
      logger.warn({ feedUrl, error: errorMessage(error) }, 'Feed cache write failed');
    }
  }
}

export const feedCacheService = new FeedCacheService();

import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema.js';
import { getConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const { Pool } = pg;

/**
 * Database connection constants
 */
const DB_CONSTANTS = {
  /** Maximum number of connection retry attempts */
  MAX_RETRIES: 5,
  /** Base delay between retries in ms (exponential backoff) */
  RETRY_BASE_DELAY_MS: 1000,
  /** Maximum delay between retries in ms */
  RETRY_MAX_DELAY_MS: 30000,
} as const;

export type Database = NodePgDatabase<typeof schema>;

let db: Database | null = null;
let pool: pg.Pool | null = null;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff delay before retry number `attempt` (1-based)
 */
export function retryDelayMs(attempt: number): number {
  return Math.min(
    DB_CONSTANTS.RETRY_BASE_DELAY_MS * Math.pow(2, attempt - 1),
    DB_CONSTANTS.RETRY_MAX_DELAY_MS
  );
}

/**
 * Check out one client to prove the pool can connect, retrying with backoff
 * @throws the last connection error once retries are exhausted
 */
export async function connectWithRetry(
  target: Pick<pg.Pool, 'connect'>,
  maxRetries: number = DB_CONSTANTS.MAX_RETRIES,
  wait: (ms: number) => Promise<void> = sleep
): Promise<void> {
  const logger = getLogger();
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const client = await target.connect();
      client.release();
      logger.info({ attempt }, 'Database connection established');
      return;
    } catch (error) {
      lastError = error;
      logger.warn({ attempt, maxRetries, error: errorMessage(error) }, 'Database connection attempt failed');
      if (attempt < maxRetries) {
        const delay = retryDelayMs(attempt);
        logger.info({ delayMs: delay }, 'Retrying database connection');
        await wait(delay);
      }
    }
  }

  logger.error({ error: errorMessage(lastError) }, 'Failed to connect to database after all retries');
  throw lastError instanceof Error ? lastError : new Error('Database connection failed');
}

/**
 * Initialize database connection with retry logic
 */
export async function initDatabase(): Promise<Database> {
  if (db) {
    return db;
  }

  const config = getConfig();
  const created = new Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
    idleTimeoutMillis: config.database.poolIdleTimeoutMs,
    connectionTimeoutMillis: config.database.poolConnectionTimeoutMs,
  });

  try {
    await connectWithRetry(created);
  } catch (error) {
    await created.end();
    throw error;
  }

  pool = created;
  db = drizzle(created, { schema });
  return db;
}

/**
 * Get database instance (must be initialized first)
 */
export function getDatabase(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Get pool for health checks
 */
export function getPool(): pg.Pool | null {
  return pool;
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
    getLogger().info('Database connection closed');
  }
}


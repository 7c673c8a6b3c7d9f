import { z } from 'zod';

/** Recommended minimum length for API keys (warning only, not enforced) */
const RECOMMENDED_API_KEY_LENGTH = 16;

/**
 * Warn about short API keys during env parsing.
 * Note: Uses console.warn because the logger is not yet available during env validation
 * (logger depends on config, which depends on env parsing completing first).
 */
const warnAboutShortKeys = (keys: string[]): void => {
  const shortKeys = keys.filter((k) => k.length < RECOMMENDED_API_KEY_LENGTH);
  if (shortKeys.length > 0) {
    console.warn(
      `[Security Warning] ${shortKeys.length} API key(s) are shorter than ${RECOMMENDED_API_KEY_LENGTH} characters. ` +
        'Consider using longer keys.'
    );
  }
};

const commaList = (val: string): string[] =>
  val.split(',').map((item) => item.trim()).filter(Boolean);

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  /** Request body limit; templates arrive base64-encoded in JSON */
  BODY_LIMIT_BYTES: z.coerce.number().default(16 * 1024 * 1024),

  // Database
  DATABASE_URL: z.string().url(),
  DB_POOL_MAX: z.coerce.number().default(20),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().default(30000),
  DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().default(2000),

  // Redis
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // Auth
  API_KEYS: z.string().transform((val) => {
    const keys = commaList(val);
    warnAboutShortKeys(keys);
    return keys;
  }),
  AUTH_SKIP_PATHS: z
    .string()
    .default('/health,/ready,/docs')
    .transform(commaList),

  // CORS
  CORS_ALLOWED_DOMAINS: z.string().default('').transform(commaList),

  // S3/Storage (S3-compatible storage - MinIO, AWS S3, DigitalOcean Spaces, etc.)
  S3_BUCKET: z.string(),
  S3_REGION: z.string().default('us-east-1'),
  S3_ENDPOINT: z.string().url(),
  S3_ACCESS_KEY_ID: z.string(),
  S3_SECRET_ACCESS_KEY: z.string(),
  S3_FORCE_PATH_STYLE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),

  // Outbound fetch safety
  FETCH_ALLOWED_PORTS: z
    .string()
    .default('80,443')
    .transform((val) => commaList(val).map((p) => parseInt(p, 10)))
    .pipe(z.array(z.number().int().min(1).max(65535)).min(1)),
  FETCH_MAX_REDIRECTS: z.coerce.number().int().min(0).max(10).default(3),
  FEED_FETCH_TIMEOUT_MS: z.coerce.number().default(10000),
  FEED_MAX_BYTES: z.coerce.number().default(50 * 1024 * 1024),
  FEED_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(1800), // 0 disables
  IMAGE_FETCH_TIMEOUT_MS: z.coerce.number().default(10000),
  IMAGE_MAX_BYTES: z.coerce.number().default(10 * 1024 * 1024),

  // Frame projects
  DEFAULT_FEED_URL: z.string().url().optional(),
  TEMPLATE_MAX_BYTES: z.coerce.number().default(10 * 1024 * 1024),
  OUTPUT_QUALITY: z.coerce.number().int().min(1).max(100).default(85),
  PREVIEW_MAX_WIDTH: z.coerce.number().int().min(1).default(800),
  PREVIEW_MAX_HEIGHT: z.coerce.number().int().min(1).default(600),
  PREVIEW_QUALITY: z.coerce.number().int().min(1).max(100).default(75),

  // Bulk runs
  BULK_CONCURRENCY: z.coerce.number().int().min(1).default(20),
  PROGRESS_INTERVAL: z.coerce.number().int().min(1).default(10),

  // Worker
  WORKER_CONCURRENCY: z.coerce.number().default(2),
  /** BullMQ lock; a job whose lock lapses is treated as stalled */
  JOB_LOCK_DURATION_MS: z.coerce.number().default(60000),

  // Queue
  QUEUE_COMPLETED_AGE_SECONDS: z.coerce.number().default(86400), // 24 hours
  QUEUE_FAILED_AGE_SECONDS: z.coerce.number().default(604800), // 7 days
  QUEUE_COMPLETED_COUNT: z.coerce.number().default(100),
  QUEUE_FAILED_COUNT: z.coerce.number().default(1000),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}

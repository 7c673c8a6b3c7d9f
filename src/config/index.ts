import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    env: 'development' | 'production' | 'test';
    bodyLimitBytes: number;
  };
  database: {
    url: string;
    poolMax: number;
    poolIdleTimeoutMs: number;
    poolConnectionTimeoutMs: number;
  };
  redis: {
    url: string;
  };
  auth: {
    apiKeys: string[];
    skipPaths: string[];
  };
  cors: {
    allowedDomains: string[];
  };
  storage: {
    bucket: string;
    region: string;
    endpoint: string;
    accessKeyId: string;
    secretAccessKey: string;
    forcePathStyle: boolean;
  };
  fetch: {
    allowedPorts: number[];
    maxRedirects: number;
    feedTimeoutMs: number;
    feedMaxBytes: number;
    feedCacheTtlSeconds: number;
    imageTimeoutMs: number;
    imageMaxBytes: number;
  };
  projects: {
    defaultFeedUrl?: string;
    templateMaxBytes: number;
    outputQuality: number;
  };
  preview: {
    maxWidth: number;
    maxHeight: number;
    quality: number;
  };
  bulk: {
    concurrency: number;
    progressInterval: number;
  };
  worker: {
    concurrency: number;
    lockDurationMs: number;
  };
  queue: {
    completedAgeSeconds: number;
    failedAgeSeconds: number;
    completedCount: number;
    failedCount: number;
  };
  logging: {
    level: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      env: env.NODE_ENV,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DB_POOL_MAX,
      poolIdleTimeoutMs: env.DB_POOL_IDLE_TIMEOUT_MS,
      poolConnectionTimeoutMs: env.DB_POOL_CONNECTION_TIMEOUT_MS,
    },
    redis: {
      url: env.REDIS_URL,
    },
    auth: {
      apiKeys: env.API_KEYS,
      skipPaths: env.AUTH_SKIP_PATHS,
    },
    cors: {
      allowedDomains: env.CORS_ALLOWED_DOMAINS,
    },
    storage: {
      bucket: env.S3_BUCKET,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT,
      accessKeyId: env.S3_ACCESS_KEY_ID,
      secretAccessKey: env.S3_SECRET_ACCESS_KEY,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
    },
    fetch: {
      allowedPorts: env.FETCH_ALLOWED_PORTS,
      maxRedirects: env.FETCH_MAX_REDIRECTS,
      feedTimeoutMs: env.FEED_FETCH_TIMEOUT_MS,
      feedMaxBytes: env.FEED_MAX_BYTES,
      feedCacheTtlSeconds: env.FEED_CACHE_TTL_SECONDS,
      imageTimeoutMs: env.IMAGE_FETCH_TIMEOUT_MS,
      imageMaxBytes: env.IMAGE_MAX_BYTES,
    },
    projects: {
      defaultFeedUrl: env.DEFAULT_FEED_URL,
      templateMaxBytes: env.TEMPLATE_MAX_BYTES,
      outputQuality: env.OUTPUT_QUALITY,
    },
    preview: {
      maxWidth: env.PREVIEW_MAX_WIDTH,
      maxHeight: env.PREVIEW_MAX_HEIGHT,
      quality: env.PREVIEW_QUALITY,
    },
    bulk: {
      concurrency: env.BULK_CONCURRENCY,
      progressInterval: env.PROGRESS_INTERVAL,
    },
    worker: {
      concurrency: env.WORKER_CONCURRENCY,
      lockDurationMs: env.JOB_LOCK_DURATION_MS,
    },
    queue: {
      completedAgeSeconds: env.QUEUE_COMPLETED_AGE_SECONDS,
      failedAgeSeconds: env.QUEUE_FAILED_AGE_SECONDS,
      completedCount: env.QUEUE_COMPLETED_COUNT,
      failedCount: env.QUEUE_FAILED_COUNT,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}

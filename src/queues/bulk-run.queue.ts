import { Queue, type JobsOptions } from 'bullmq';
import { getRedis } from './redis.js';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import type { BulkRunJobData } from '../types/project.types.js';

const logger = createChildLogger({ service: 'bulk-run-queue' });

export const BULK_RUN_QUEUE_NAME = 'bulk-runs';

let queue: Queue<BulkRunJobData> | null = null;

/**
 * Initialize bulk run queue. Runs are never retried by the queue: a failed
 * run is recorded on the project and re-running is the caller's decision.
 */
export function initBulkRunQueue(): Queue<BulkRunJobData> {
  if (queue) {
    return queue;
  }

  const redis = getRedis();
  if (!redis) {
    throw new Error('Redis not initialized');
  }

  const config = getConfig();

  queue = new Queue<BulkRunJobData>(BULK_RUN_QUEUE_NAME, {
    connection: redis,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: {
        count: config.queue.completedCount,
        age: config.queue.completedAgeSeconds,
      },
      removeOnFail: {
        count: config.queue.failedCount,
        age: config.queue.failedAgeSeconds,
      },
    },
  });

  logger.info({ queueName: BULK_RUN_QUEUE_NAME }, 'Bulk run queue initialized');

  return queue;
}

/**
 * Enqueue a claimed run
 */
export async function addBulkRunJob(
  projectId: string,
  runId: string,
  options: JobsOptions = {}
): Promise<void> {
  const q = initBulkRunQueue();

  await q.add(
    'run',
    { projectId, runId },
    {
      jobId: runId, // Run ID as BullMQ job ID for deduplication
      ...options,
    }
  );

  logger.info({ projectId, runId }, 'Bulk run queued');
}

export interface QueueCounts {
  waiting: number;
  active: number;
  failed: number;
}

/**
 * Job counts for the queue health probe
 */
export async function getBulkRunQueueCounts(): Promise<QueueCounts> {
  const counts = await initBulkRunQueue().getJobCounts('waiting', 'active', 'failed');
  return {
    waiting: counts.waiting ?? 0,
    active: counts.active ?? 0,
    failed: counts.failed ?? 0,
  };
}

/**
 * Close bulk run queue
 */
export async function closeBulkRunQueue(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = null;
    logger.info('Bulk run queue closed');
  }
}

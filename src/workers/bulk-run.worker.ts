import { Worker, type Job as BullJob } from 'bullmq';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { bulkRunService } from '../services/bulk-run.service.js';
import { BULK_RUN_QUEUE_NAME } from '../queues/bulk-run.queue.js';
import { AlreadyRunningError } from '../utils/errors.js';
import type { BulkRunJobData, BulkRunResult } from '../types/project.types.js';

const logger = createChildLogger({ service: 'bulk-run-worker' });

let worker: Worker<BulkRunJobData, BulkRunResult | null> | null = null;

/**
 * Process bulk run job
 */
export async function processBulkRunJob(bullJob: BullJob<BulkRunJobData>): Promise<BulkRunResult | null> {
  const { projectId, runId } = bullJob.data;

  logger.info({ projectId, runId, bullJobId: bullJob.id }, 'Processing bulk run');

  return bulkRunService.execute(projectId, runId, async (progress) => {
    const percentage = progress.total > 0 ? Math.round((progress.processed / progress.total) * 100) : 100;
    await bullJob.updateProgress(percentage);
  });
}

/**
 * Record a job that threw or stalled past its limit as a failed run, so the
 * project does not stay claimed.
 */
export async function handleFailedBulkRunJob(
  bullJob: BullJob<BulkRunJobData> | undefined,
  error: Error
): Promise<void> {
  logger.error(
    {
      projectId: bullJob?.data.projectId,
      runId: bullJob?.data.runId,
      bullJobId: bullJob?.id,
      errorMessage: error.message,
      errorName: error.name,
    },
    'Bulk run job failed'
  );

  // A redelivered job that found its run still going in this process
  if (bullJob && !(error instanceof AlreadyRunningError)) {
    await bulkRunService.recordFailure(bullJob.data.projectId, bullJob.data.runId, error.message);
  }
}

/**
 * Start bulk run worker
 */
export function startBulkRunWorker(): Worker<BulkRunJobData, BulkRunResult | null> {
  if (worker) {
    return worker;
  }

  const config = getConfig();

  worker = new Worker<BulkRunJobData, BulkRunResult | null>(BULK_RUN_QUEUE_NAME, processBulkRunJob, {
    connection: { url: config.redis.url },
    concurrency: config.worker.concurrency,
    lockDuration: config.worker.lockDurationMs,
    removeOnComplete: { count: config.queue.completedCount },
    removeOnFail: { count: config.queue.failedCount },
  });

  worker.on('completed', (job, result) => {
    logger.info(
      {
        projectId: job.data.projectId,
        runId: job.data.runId,
        attempted: result?.attempted,
        succeeded: result?.succeeded,
        failed: result?.failed,
      },
      'Bulk run job completed'
    );
  });

  worker.on('failed', (job, error) => {
    void handleFailedBulkRunJob(job, error);
  });

  worker.on('error', (error) => {
    logger.error({ error: error.message }, 'Worker error');
  });

  worker.on('stalled', (jobId) => {
    logger.warn({ jobId }, 'Job stalled');
  });

  logger.info(
    { queueName: BULK_RUN_QUEUE_NAME, concurrency: config.worker.concurrency },
    'Bulk run worker started'
  );

  return worker;
}

/**
 * Stop bulk run worker
 */
export async function stopBulkRunWorker(): Promise<void> {
  if (worker) {
    await worker.close();
    worker = null;
    logger.info('Bulk run worker stopped');
  }
}

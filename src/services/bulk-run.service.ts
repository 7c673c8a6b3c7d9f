import { createHash } from 'crypto';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { parallelMap, type ParallelOutcome } from '../utils/parallel.js';
import { safeFetch } from '../utils/safe-fetch.js';
import { getFormatExtension, getFormatMimeType, type ImageFormat } from '../utils/mime-types.js';
import {
  AlreadyRunningError,
  ConfigurationError,
  FeedError,
  errorMessage,
} from '../utils/errors.js';
import {
  OutputStatus,
  type BulkRunResult,
  type OverlayRect,
  type ParsedFeed,
  type ProductRecord,
  type RunProgress,
} from '../types/project.types.js';
import type { FrameProject } from '../db/schema.js';
import { compositorService, validateRect, type CompositorService, type TemplateImage } from './compositor.service.js';
import { feedService, type FeedService } from './feed.service.js';
import { outputStore, type OutputStore } from './output-store.service.js';
import { projectStore, type ProjectStore } from './project-store.service.js';
import { getProjectKey, storageService, type BlobStore } from './storage.service.js';

const logger = createChildLogger({ service: 'bulk-run' });

export interface BulkRunDependencies {
  projects: ProjectStore;
  outputs: OutputStore;
  blobs: BlobStore;
  feeds: Pick<FeedService, 'fetchAndParse'>;
  compositor: Pick<CompositorService, 'compose'>;
  fetchImage: (url: string) => Promise<Buffer>;
}

export interface BulkRunSettings {
  concurrency: number;
  /** Report progress every N settled items (the last item always reports) */
  progressInterval: number;
}

export interface RunOptions {
  runId: string;
  /** Consulted before every blob upload and Output write */
  isRunActive?: () => Promise<boolean>;
  onProgress?: (progress: RunProgress) => Promise<void>;
}

type ItemResult =
  | { status: 'succeeded'; productId: string }
  | { status: 'failed'; productId: string; reason: string }
  | { status: 'cancelled'; productId: string };

interface WriteGate {
  done: Promise<void>;
  open: () => void;
}

function createGate(): WriteGate {
  let open: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { done, open };
}

/**
 * Fetch a product image through the SSRF checks using configured limits
 */
export async function fetchProductImage(url: string): Promise<Buffer> {
  const { fetch } = getConfig();
  const response = await safeFetch(url, {
    kind: 'image',
    timeoutMs: fetch.imageTimeoutMs,
    maxBytes: fetch.imageMaxBytes,
    allowedPorts: fetch.allowedPorts,
    maxRedirects: fetch.maxRedirects,
  });
  return response.body;
}

/**
 * Blob key of a product's output. The hash suffix keeps ids that sanitize
 * to the same text apart.
 */
export function outputKey(projectId: string, productId: string, format: ImageFormat): string {
  const safeProductId = productId.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 50) || 'product';
  const digest = createHash('sha256').update(productId).digest('hex').slice(0, 8);
  return getProjectKey(projectId, 'outputs', `${safeProductId}-${digest}.${getFormatExtension(format)}`);
}

/**
 * Rectangle of a project, checked against its template
 * @throws ConfigurationError (RECT_NOT_SET), BoundsError
 */
export function requireOverlayRect(project: FrameProject): OverlayRect {
  if (!project.overlayRect) {
    throw new ConfigurationError('Overlay rectangle is not set', 'RECT_NOT_SET');
  }
  validateRect({ width: project.templateWidth, height: project.templateHeight }, project.overlayRect);
  return project.overlayRect;
}

function defaultDependencies(): BulkRunDependencies {
  return {
    projects: projectStore,
    outputs: outputStore,
    blobs: storageService,
    feeds: feedService,
    compositor: compositorService,
    fetchImage: fetchProductImage,
  };
}

/**
 * Bulk Run Service
 * Fans a project's feed out over the compositor with bounded concurrency
 * and upserts one Output per product.
 */
export class BulkRunService {
  /** Projects with a run in progress in this process */
  private readonly activeRuns = new Set<string>();

  constructor(
    private readonly deps: BulkRunDependencies = defaultDependencies(),
    private readonly settings?: BulkRunSettings
  ) {}

  private resolveSettings(): BulkRunSettings {
    if (this.settings) {
      return this.settings;
    }
    const { bulk } = getConfig();
    return { concurrency: bulk.concurrency, progressInterval: bulk.progressInterval };
  }

  isActive(projectId: string): boolean {
    return this.activeRuns.has(projectId);
  }

  /**
   * Run one bulk pass over the project's feed
   * @throws AlreadyRunningError when this process is already running the project
   * @throws ConfigurationError before any I/O when the rectangle is unset or out of bounds
   */
  async run(project: FrameProject, options: RunOptions): Promise<BulkRunResult> {
    if (this.activeRuns.has(project.id)) {
      throw new AlreadyRunningError(project.id);
    }
    this.activeRuns.add(project.id);

    try {
      return await this.runExclusive(project, options);
    } finally {
      this.activeRuns.delete(project.id);
    }
  }

  private async runExclusive(project: FrameProject, options: RunOptions): Promise<BulkRunResult> {
    const startedAt = Date.now();
    const rect = requireOverlayRect(project);
    const { runId } = options;
    const runLogger = logger.child({ projectId: project.id, runId });

    const result: BulkRunResult = {
      projectId: project.id,
      runId,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      failures: [],
      warnings: [],
      cancelled: false,
      durationMs: 0,
    };

    let feed: ParsedFeed;
    try {
      feed = await this.deps.feeds.fetchAndParse(project.feedUrl);
    } catch (error) {
      if (!(error instanceof FeedError)) {
        throw error;
      }
      runLogger.warn({ feedUrl: project.feedUrl, error: error.message }, 'Feed failed, run aborted');
      return { ...result, feedError: error.message, durationMs: Date.now() - startedAt };
    }

    result.warnings = feed.warnings;
    const records = feed.records;

    const template: TemplateImage = {
      buffer: await this.deps.blobs.downloadBuffer(project.templateKey),
      format: project.templateFormat,
      width: project.templateWidth,
      height: project.templateHeight,
    };

    runLogger.info({ records: records.length, skipped: feed.warnings.length }, 'Bulk run started');

    let cancelled = false;
    const stillActive = async (): Promise<boolean> => {
      if (cancelled) {
        return false;
      }
      if (!options.isRunActive || (await options.isRunActive())) {
        return true;
      }
      if (!cancelled) {
        cancelled = true;
        runLogger.info('Run is no longer active, skipping further writes');
      }
      return false;
    };

    // Last write of each product id; a later duplicate waits for it
    const writeGates = new Map<string, Promise<void>>();

    const { concurrency, progressInterval } = this.resolveSettings();
    const total = records.length;
    let processed = 0;
    let failed = 0;
    let progressChain: Promise<void> = Promise.resolve();

    const reportProgress = (outcome: ParallelOutcome<ItemResult>): void => {
      if (outcome.status === 'fulfilled' && outcome.value.status === 'cancelled') {
        return;
      }
      processed++;
      if (outcome.status === 'rejected' || (outcome.status === 'fulfilled' && outcome.value.status === 'failed')) {
        failed++;
      }
      const { onProgress } = options;
      if (onProgress && (processed % progressInterval === 0 || processed === total)) {
        const progress: RunProgress = { processed, failed, total };
        progressChain = progressChain.then(() =>
          onProgress(progress).catch((error: unknown) => {
            runLogger.warn({ error: errorMessage(error), ...progress }, 'Progress update failed');
          })
        );
      }
    };

    const { outcomes } = await parallelMap(
      records,
      (record) => {
        const previous = writeGates.get(record.productId) ?? Promise.resolve();
        const gate = createGate();
        writeGates.set(record.productId, gate.done);
        return this.processItem(project.id, template, rect, record, previous, stillActive).finally(gate.open);
      },
      { concurrency, shouldContinue: () => !cancelled, onSettled: reportProgress }
    );

    await progressChain;

    outcomes.forEach((outcome, index) => {
      const productId = records[index]?.productId ?? `#${index + 1}`;
      if (outcome.status === 'skipped') {
        return;
      }
      if (outcome.status === 'rejected') {
        // A write that raced a deletion is not an item failure
        if (cancelled) {
          return;
        }
        result.attempted++;
        result.failed++;
        result.failures.push({ productId, reason: outcome.error.message });
        return;
      }
      const item = outcome.value;
      if (item.status === 'cancelled') {
        return;
      }
      result.attempted++;
      if (item.status === 'succeeded') {
        result.succeeded++;
      } else {
        result.failed++;
        result.failures.push({ productId, reason: item.reason });
      }
    });

    result.cancelled = cancelled;
    result.durationMs = Date.now() - startedAt;

    runLogger.info(
      {
        attempted: result.attempted,
        succeeded: result.succeeded,
        failed: result.failed,
        cancelled: result.cancelled,
        durationMs: result.durationMs,
      },
      'Bulk run finished'
    );

    return result;
  }

  /**
   * Fetch, compose, upload and record one product. Per-item failures are
   * recorded as failed Outputs and returned, not thrown.
   */
  private async processItem(
    projectId: string,
    template: TemplateImage,
    rect: OverlayRect,
    record: ProductRecord,
    previousWrite: Promise<void>,
    stillActive: () => Promise<boolean>
  ): Promise<ItemResult> {
    const { productId, imageUrl } = record;

    const fail = async (reason: string): Promise<ItemResult> => {
      await previousWrite;
      if (!(await stillActive())) {
        return { status: 'cancelled', productId };
      }
      await this.deps.outputs.upsert(projectId, productId, {
        sourceImageUrl: imageUrl,
        status: OutputStatus.FAILED,
        imageKey: null,
        imageUrl: null,
        reason,
      });
      logger.debug({ projectId, productId, reason }, 'Product failed');
      return { status: 'failed', productId, reason };
    };

    let composed: Buffer;
    try {
      const productBytes = await this.deps.fetchImage(imageUrl);
      composed = await this.deps.compositor.compose(template, rect, productBytes);
    } catch (error) {
      return fail(errorMessage(error));
    }

    await previousWrite;
    if (!(await stillActive())) {
      return { status: 'cancelled', productId };
    }

    const key = outputKey(projectId, productId, template.format);
    let uploadedUrl: string;
    try {
      const upload = await this.deps.blobs.uploadBuffer(composed, key, getFormatMimeType(template.format));
      uploadedUrl = upload.url;
    } catch (error) {
      return fail(`Upload failed: ${errorMessage(error)}`);
    }

    if (!(await stillActive())) {
      return { status: 'cancelled', productId };
    }

    await this.deps.outputs.upsert(projectId, productId, {
      sourceImageUrl: imageUrl,
      status: OutputStatus.SUCCEEDED,
      imageKey: key,
      imageUrl: uploadedUrl,
      reason: null,
    });

    return { status: 'succeeded', productId };
  }

  /**
   * Worker entry: run a queued job for the run that claimed the project and
   * record the outcome on it. Stale jobs (project deleted or claimed by a
   * newer run) are skipped.
   */
  async execute(
    projectId: string,
    runId: string,
    onProgress?: (progress: RunProgress) => Promise<void>
  ): Promise<BulkRunResult | null> {
    const { projects } = this.deps;

    let result: BulkRunResult;
    try {
      const project = await projects.get(projectId);
      if (!project) {
        logger.warn({ projectId, runId }, 'Project no longer exists, skipping run');
        return null;
      }
      if (project.activeRunId !== runId) {
        logger.info({ projectId, runId, activeRunId: project.activeRunId }, 'Run is stale, skipping');
        return null;
      }

      result = await this.run(project, {
        runId,
        isRunActive: () => projects.isRunActive(projectId, runId),
        onProgress: async (progress) => {
          await projects.updateProgress(projectId, runId, progress);
          await onProgress?.(progress);
        },
      });
    } catch (error) {
      if (!(error instanceof AlreadyRunningError)) {
        logger.error({ projectId, runId, error: errorMessage(error) }, 'Bulk run failed');
        await this.recordFailure(projectId, runId, errorMessage(error));
      }
      throw error;
    }

    if (result.feedError) {
      await projects.failRun(projectId, runId, result.feedError, result);
    } else {
      await projects.completeRun(projectId, runId, result);
    }
    return result;
  }

  /**
   * Mark the run failed if it still owns the project. A store error here is
   * logged so the original run error reaches the queue.
   */
  async recordFailure(projectId: string, runId: string, message: string): Promise<void> {
    try {
      await this.deps.projects.failRun(projectId, runId, message);
    } catch (error) {
      logger.error({ projectId, runId, error: errorMessage(error) }, 'Could not record run failure');
    }
  }
}

export const bulkRunService = new BulkRunService();

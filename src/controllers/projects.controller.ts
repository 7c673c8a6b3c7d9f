import { randomUUID } from 'crypto';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import {
  ConfigurationError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { isSafeProtocol } from '../utils/url-validator.js';
import { getFormatExtension, getFormatMimeType } from '../utils/mime-types.js';
import { addBulkRunJob } from '../queues/bulk-run.queue.js';
import { compositorService, validateRect, type CompositorService, type TemplateImage } from '../services/compositor.service.js';
import { previewService, type PreviewService, type PreviewSource } from '../services/preview.service.js';
import { feedService, type FeedService } from '../services/feed.service.js';
import { projectStore, type ProjectStore } from '../services/project-store.service.js';
import { outputStore, type OutputStore } from '../services/output-store.service.js';
import { getProjectKey, storageService, type BlobStore } from '../services/storage.service.js';
import { requireOverlayRect } from '../services/bulk-run.service.js';
import type { FrameProject, Output } from '../db/schema.js';
import type {
  BulkRunResult,
  CreateProjectRequest,
  OutputsQuery,
  OverlayRect,
  PreviewRequest,
  ProjectListQuery,
  ProjectStatus,
} from '../types/project.types.js';

const logger = createChildLogger({ service: 'projects-controller' });

export interface ProjectsControllerDependencies {
  projects: ProjectStore;
  outputs: OutputStore;
  blobs: BlobStore;
  compositor: Pick<CompositorService, 'inspectTemplate'>;
  previews: Pick<PreviewService, 'preview'>;
  feeds: Pick<FeedService, 'firstProduct'>;
  enqueueRun: (projectId: string, runId: string) => Promise<void>;
  defaultFeedUrl?: () => string | undefined;
}

export interface RunStatusView {
  projectId: string;
  status: ProjectStatus;
  activeRunId: string | null;
  totalProducts: number;
  processedProducts: number;
  failedProducts: number;
  progressPercentage: number;
  successRate: number;
  processingStartedAt: Date | null;
  processingCompletedAt: Date | null;
  lastRunResult: BulkRunResult | null;
  lastError: string | null;
}

export interface ProjectView {
  id: string;
  name: string;
  feedUrl: string;
  status: ProjectStatus;
  template: {
    key: string;
    url: string;
    format: string;
    width: number;
    height: number;
    bytes: number;
  };
  overlayRect: OverlayRect | null;
  run: RunStatusView;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProjectListView {
  projects: ProjectView[];
  total: number;
  offset: number;
  limit: number;
}

export interface OutputListView {
  outputs: Output[];
  total: number;
  filtered: number;
  offset: number;
  limit: number;
}

export interface PreviewView {
  dataUri: string;
  contentType: string;
  width: number;
  height: number;
  rect: OverlayRect;
  /** Set when the preview used the first product of the feed */
  productId: string | null;
}

export interface RunAccepted {
  projectId: string;
  runId: string;
  status: ProjectStatus;
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

/**
 * Run progress with derived percentages
 */
export function toRunStatus(project: FrameProject): RunStatusView {
  const succeeded = project.processedProducts - project.failedProducts;
  return {
    projectId: project.id,
    status: project.status,
    activeRunId: project.activeRunId,
    totalProducts: project.totalProducts,
    processedProducts: project.processedProducts,
    failedProducts: project.failedProducts,
    progressPercentage: percentage(project.processedProducts, project.totalProducts),
    successRate: percentage(succeeded, project.processedProducts),
    processingStartedAt: project.processingStartedAt,
    processingCompletedAt: project.processingCompletedAt,
    lastRunResult: project.lastRunResult,
    lastError: project.lastError,
  };
}

function defaultDependencies(): ProjectsControllerDependencies {
  return {
    projects: projectStore,
    outputs: outputStore,
    blobs: storageService,
    compositor: compositorService,
    previews: previewService,
    feeds: feedService,
    enqueueRun: addBulkRunJob,
    defaultFeedUrl: () => getConfig().projects.defaultFeedUrl,
  };
}

/**
 * ProjectsController - frame project operations behind the HTTP routes
 */
export class ProjectsController {
  constructor(private readonly deps: ProjectsControllerDependencies = defaultDependencies()) {}

  private toView(project: FrameProject): ProjectView {
    return {
      id: project.id,
      name: project.name,
      feedUrl: project.feedUrl,
      status: project.status,
      template: {
        key: project.templateKey,
        url: this.deps.blobs.getPublicUrl(project.templateKey),
        format: project.templateFormat,
        width: project.templateWidth,
        height: project.templateHeight,
        bytes: project.templateBytes,
      },
      overlayRect: project.overlayRect,
      run: toRunStatus(project),
      createdAt: project.createdAt,
      updatedAt: project.updatedAt,
    };
  }

  private async requireProject(id: string, ownerId: string): Promise<FrameProject> {
    const project = await this.deps.projects.get(id, ownerId);
    if (!project) {
      throw new NotFoundError(`Project ${id} not found`);
    }
    return project;
  }

  private async loadTemplate(project: FrameProject): Promise<TemplateImage> {
    return {
      buffer: await this.deps.blobs.downloadBuffer(project.templateKey),
      format: project.templateFormat,
      width: project.templateWidth,
      height: project.templateHeight,
    };
  }

  /**
   * Create a project from a base64 template
   * @throws ValidationError without a usable feed URL
   * @throws ConfigurationError (INVALID_TEMPLATE)
   */
  async createProject(ownerId: string, data: CreateProjectRequest): Promise<ProjectView> {
    const feedUrl = data.feedUrl ?? this.deps.defaultFeedUrl?.();
    if (!feedUrl) {
      throw new ValidationError('feedUrl is required when no default feed is configured', undefined, 'FEED_URL_REQUIRED');
    }
    if (!isSafeProtocol(feedUrl)) {
      throw new ValidationError('feedUrl must be an http(s) URL', undefined, 'INVALID_FEED_URL');
    }

    const bytes = Buffer.from(data.template, 'base64');
    const metadata = await this.deps.compositor.inspectTemplate(bytes);

    const id = randomUUID();
    const key = getProjectKey(id, `template.${getFormatExtension(metadata.format)}`);
    await this.deps.blobs.uploadBuffer(bytes, key, getFormatMimeType(metadata.format));

    let project: FrameProject;
    try {
      project = await this.deps.projects.create({
        id,
        ownerId,
        name: data.name,
        feedUrl,
        template: { key, ...metadata },
      });
    } catch (error) {
      logger.error({ projectId: id, error: errorMessage(error) }, 'Project insert failed, removing template');
      await this.deps.blobs.deletePrefix(`${getProjectKey(id)}/`);
      throw error;
    }

    logger.info(
      { projectId: id, ownerId, format: metadata.format, width: metadata.width, height: metadata.height },
      'Project created'
    );

    return this.toView(project);
  }

  async getProject(id: string, ownerId: string): Promise<ProjectView> {
    return this.toView(await this.requireProject(id, ownerId));
  }

  async listProjects(ownerId: string, query: ProjectListQuery): Promise<ProjectListView> {
    const { total, rows } = await this.deps.projects.list(ownerId, query);
    return {
      projects: rows.map((project) => this.toView(project)),
      total,
      offset: query.offset,
      limit: query.limit,
    };
  }

  /**
   * Set the overlay rectangle; an out-of-bounds rectangle leaves the project untouched
   * @throws NotFoundError, BoundsError, AlreadyRunningError
   */
  async setOverlayRect(id: string, ownerId: string, rect: OverlayRect): Promise<ProjectView> {
    const project = await this.requireProject(id, ownerId);
    validateRect({ width: project.templateWidth, height: project.templateHeight }, rect);

    const updated = await this.deps.projects.setOverlayRect(id, rect);
    logger.info({ projectId: id, rect }, 'Overlay rectangle set');
    return this.toView(updated);
  }

  /**
   * Render a preview. Without an image, the first product of the feed is used.
   */
  async preview(id: string, ownerId: string, request: PreviewRequest): Promise<PreviewView> {
    const project = await this.requireProject(id, ownerId);

    const rect = request.rect ?? project.overlayRect;
    if (!rect) {
      throw new ConfigurationError('Overlay rectangle is not set', 'RECT_NOT_SET');
    }
    validateRect({ width: project.templateWidth, height: project.templateHeight }, rect);

    let source: PreviewSource;
    let productId: string | null = null;
    if (request.image) {
      source = { kind: 'bytes', bytes: Buffer.from(request.image, 'base64') };
    } else if (request.imageUrl) {
      source = { kind: 'url', url: request.imageUrl };
    } else {
      const product = await this.deps.feeds.firstProduct(project.feedUrl);
      if (!product) {
        throw new NotFoundError('Feed has no products to preview', 'NO_PRODUCTS');
      }
      source = { kind: 'url', url: product.imageUrl };
      productId = product.productId;
    }

    const template = await this.loadTemplate(project);
    const result = await this.deps.previews.preview(template, rect, source);

    return {
      dataUri: result.dataUri,
      contentType: result.contentType,
      width: result.width,
      height: result.height,
      rect,
      productId,
    };
  }

  /**
   * Claim the project and queue a bulk run
   * @throws ConfigurationError before claiming, AlreadyRunningError when a run is active
   */
  async triggerRun(id: string, ownerId: string): Promise<RunAccepted> {
    const project = await this.requireProject(id, ownerId);
    requireOverlayRect(project);

    const runId = await this.deps.projects.beginRun(id);

    try {
      await this.deps.enqueueRun(id, runId);
    } catch (error) {
      const message = `Could not queue run: ${errorMessage(error)}`;
      logger.error({ projectId: id, runId, error: errorMessage(error) }, 'Failed to queue bulk run');
      await this.deps.projects.failRun(id, runId, message);
      throw error;
    }

    logger.info({ projectId: id, runId }, 'Bulk run triggered');
    return { projectId: id, runId, status: 'processing' };
  }

  async getRunStatus(id: string, ownerId: string): Promise<RunStatusView> {
    return toRunStatus(await this.requireProject(id, ownerId));
  }

  async listOutputs(id: string, ownerId: string, query: OutputsQuery): Promise<OutputListView> {
    await this.requireProject(id, ownerId);
    const page = await this.deps.outputs.page(id, query);
    return {
      outputs: page.rows,
      total: page.total,
      filtered: page.filtered,
      offset: query.offset,
      limit: query.limit,
    };
  }

  /**
   * Delete a project, its outputs and its blobs. An active run sees the
   * project gone and stops writing.
   */
  async deleteProject(id: string, ownerId: string): Promise<void> {
    await this.requireProject(id, ownerId);
    await this.deps.projects.delete(id);

    try {
      const removed = await this.deps.blobs.deletePrefix(`${getProjectKey(id)}/`);
      logger.info({ projectId: id, blobs: removed }, 'Project deleted');
    } catch (error) {
      // Orphaned blobs are swept by the cleanup CLI
      logger.warn({ projectId: id, error: errorMessage(error) }, 'Project deleted, blob cleanup failed');
    }
  }
}

export const projectsController = new ProjectsController();

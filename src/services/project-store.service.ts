import { randomUUID } from 'crypto';
import { and, count, desc, eq, inArray, ne } from 'drizzle-orm';
import { getDatabase } from '../db/index.js';
import { frameProjects, type FrameProject } from '../db/schema.js';
import { AlreadyRunningError, NotFoundError } from '../utils/errors.js';
import {
  ProjectStatus,
  type BulkRunResult,
  type OverlayRect,
  type RunProgress,
  type TemplateInfo,
} from '../types/project.types.js';

export interface NewProjectInput {
  id?: string;
  ownerId: string;
  name: string;
  feedUrl: string;
  template: TemplateInfo;
}

export interface ProjectPage {
  total: number;
  rows: FrameProject[];
}

/**
 * Frame project persistence and run bookkeeping
 */
export interface ProjectStore {
  create(input: NewProjectInput): Promise<FrameProject>;
  /** With an owner, projects of other owners are not found */
  get(id: string, ownerId?: string): Promise<FrameProject | null>;
  list(ownerId: string, page: { offset: number; limit: number }): Promise<ProjectPage>;
  /** @throws NotFoundError, AlreadyRunningError */
  setOverlayRect(id: string, rect: OverlayRect): Promise<FrameProject>;
  /**
   * Claim the project for a new run
   * @throws NotFoundError, AlreadyRunningError
   */
  beginRun(id: string): Promise<string>;
  /** True while the project exists and the run still owns it */
  isRunActive(id: string, runId: string): Promise<boolean>;
  updateProgress(id: string, runId: string, progress: RunProgress): Promise<void>;
  completeRun(id: string, runId: string, result: BulkRunResult): Promise<void>;
  failRun(id: string, runId: string, message: string, result?: BulkRunResult): Promise<void>;
  delete(id: string): Promise<boolean>;
  existingIds(ids: string[]): Promise<Set<string>>;
}

/**
 * Project store backed by PostgreSQL
 */
export class DrizzleProjectStore implements ProjectStore {
  async create(input: NewProjectInput): Promise<FrameProject> {
    const db = getDatabase();
    const { template } = input;

    const [project] = await db
      .insert(frameProjects)
      .values({
        id: input.id,
        ownerId: input.ownerId,
        name: input.name,
        feedUrl: input.feedUrl,
        templateKey: template.key,
        templateFormat: template.format,
        templateWidth: template.width,
        templateHeight: template.height,
        templateBytes: template.bytes,
        status: ProjectStatus.DRAFT,
      })
      .returning();

    if (!project) {
      throw new Error('Insert returned no project');
    }
    return project;
  }

  async get(id: string, ownerId?: string): Promise<FrameProject | null> {
    const db = getDatabase();
    const filter = ownerId
      ? and(eq(frameProjects.id, id), eq(frameProjects.ownerId, ownerId))
      : eq(frameProjects.id, id);

    const [project] = await db.select().from(frameProjects).where(filter).limit(1);
    return project ?? null;
  }

  async list(ownerId: string, page: { offset: number; limit: number }): Promise<ProjectPage> {
    const db = getDatabase();
    const filter = eq(frameProjects.ownerId, ownerId);

    const [totalRows, rows] = await Promise.all([
      db.select({ value: count() }).from(frameProjects).where(filter),
      db
        .select()
        .from(frameProjects)
        .where(filter)
        .orderBy(desc(frameProjects.createdAt))
        .limit(page.limit)
        .offset(page.offset),
    ]);

    return { total: totalRows[0]?.value ?? 0, rows };
  }

  /**
   * Explain why a conditional update on an idle project matched nothing
   */
  private async conflictFor(id: string): Promise<Error> {
    const existing = await this.get(id);
    return existing ? new AlreadyRunningError(id) : new NotFoundError(`Project ${id} not found`);
  }

  async setOverlayRect(id: string, rect: OverlayRect): Promise<FrameProject> {
    const db = getDatabase();

    const [project] = await db
      .update(frameProjects)
      .set({ overlayRect: rect, status: ProjectStatus.COORDINATES_SET, updatedAt: new Date() })
      .where(and(eq(frameProjects.id, id), ne(frameProjects.status, ProjectStatus.PROCESSING)))
      .returning();

    if (!project) {
      throw await this.conflictFor(id);
    }
    return project;
  }

  async beginRun(id: string): Promise<string> {
    const db = getDatabase();
    const runId = randomUUID();
    const now = new Date();

    // Conditional update: only one caller can move the project into processing
    const [claimed] = await db
      .update(frameProjects)
      .set({
        status: ProjectStatus.PROCESSING,
        activeRunId: runId,
        totalProducts: 0,
        processedProducts: 0,
        failedProducts: 0,
        lastError: null,
        processingStartedAt: now,
        processingCompletedAt: null,
        updatedAt: now,
      })
      .where(and(eq(frameProjects.id, id), ne(frameProjects.status, ProjectStatus.PROCESSING)))
      .returning({ id: frameProjects.id });

    if (!claimed) {
      throw await this.conflictFor(id);
    }
    return runId;
  }

  async isRunActive(id: string, runId: string): Promise<boolean> {
    const db = getDatabase();
    const [row] = await db
      .select({ activeRunId: frameProjects.activeRunId })
      .from(frameProjects)
      .where(eq(frameProjects.id, id))
      .limit(1);

    return row?.activeRunId === runId;
  }

  private ownedByRun(id: string, runId: string) {
    return and(eq(frameProjects.id, id), eq(frameProjects.activeRunId, runId));
  }

  async updateProgress(id: string, runId: string, progress: RunProgress): Promise<void> {
    const db = getDatabase();
    await db
      .update(frameProjects)
      .set({
        totalProducts: progress.total,
        processedProducts: progress.processed,
        failedProducts: progress.failed,
        updatedAt: new Date(),
      })
      .where(this.ownedByRun(id, runId));
  }

  async completeRun(id: string, runId: string, result: BulkRunResult): Promise<void> {
    const db = getDatabase();
    const now = new Date();
    await db
      .update(frameProjects)
      .set({
        status: ProjectStatus.COMPLETED,
        activeRunId: null,
        totalProducts: result.attempted,
        processedProducts: result.attempted,
        failedProducts: result.failed,
        lastRunResult: result,
        lastError: null,
        processingCompletedAt: now,
        updatedAt: now,
      })
      .where(this.ownedByRun(id, runId));
  }

  async failRun(id: string, runId: string, message: string, result?: BulkRunResult): Promise<void> {
    const db = getDatabase();
    const now = new Date();
    await db
      .update(frameProjects)
      .set({
        status: ProjectStatus.FAILED,
        activeRunId: null,
        lastRunResult: result ?? null,
        lastError: message,
        processingCompletedAt: now,
        updatedAt: now,
      })
      .where(this.ownedByRun(id, runId));
  }

  async delete(id: string): Promise<boolean> {
    const db = getDatabase();
    const deleted = await db
      .delete(frameProjects)
      .where(eq(frameProjects.id, id))
      .returning({ id: frameProjects.id });
    return deleted.length > 0;
  }

  async existingIds(ids: string[]): Promise<Set<string>> {
    if (ids.length === 0) {
      return new Set();
    }
    const db = getDatabase();
    const rows = await db
      .select({ id: frameProjects.id })
      .from(frameProjects)
      .where(inArray(frameProjects.id, ids));
    return new Set(rows.map((row) => row.id));
  }
}

export const projectStore = new DrizzleProjectStore();

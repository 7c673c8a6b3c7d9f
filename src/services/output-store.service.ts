import { and, asc, count, desc, eq, ilike } from 'drizzle-orm';
import { getDatabase } from '../db/index.js';
import { outputs, type Output } from '../db/schema.js';
import type { OutputStatus } from '../types/project.types.js';

export const MAX_PAGE_SIZE = 100;

export interface OutputWrite {
  sourceImageUrl: string;
  status: OutputStatus;
  imageKey: string | null;
  imageUrl: string | null;
  reason: string | null;
}

export interface OutputPageQuery {
  search?: string;
  offset?: number;
  limit?: number;
}

export interface OutputPage {
  /** Outputs of the project, unfiltered */
  total: number;
  /** Outputs matching the search term */
  filtered: number;
  rows: Output[];
}

/**
 * Persisted outputs, keyed on (projectId, productId)
 */
export interface OutputStore {
  upsert(projectId: string, productId: string, write: OutputWrite): Promise<Output>;
  page(projectId: string, query: OutputPageQuery): Promise<OutputPage>;
}

export interface NormalizedPageQuery {
  search: string | null;
  offset: number;
  limit: number;
}

/**
 * Clamp paging input: limit to 1..100, offset to >= 0, blank search to none
 */
export function normalizePageQuery(query: OutputPageQuery): NormalizedPageQuery {
  const limit = Math.min(Math.max(Math.trunc(query.limit ?? 25), 1), MAX_PAGE_SIZE);
  const offset = Math.max(Math.trunc(query.offset ?? 0), 0);
  const search = query.search?.trim() || null;
  return { search, offset, limit };
}

/**
 * Escape LIKE wildcards so a search term matches literally
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Output store backed by PostgreSQL
 */
export class DrizzleOutputStore implements OutputStore {
  async upsert(projectId: string, productId: string, write: OutputWrite): Promise<Output> {
    const db = getDatabase();
    const generatedAt = new Date();

    const [row] = await db
      .insert(outputs)
      .values({ projectId, productId, ...write, generatedAt })
      .onConflictDoUpdate({
        target: [outputs.projectId, outputs.productId],
        set: { ...write, generatedAt },
      })
      .returning();

    if (!row) {
      throw new Error(`Upsert returned no row for ${projectId}/${productId}`);
    }
    return row;
  }

  async page(projectId: string, query: OutputPageQuery): Promise<OutputPage> {
    const db = getDatabase();
    const { search, offset, limit } = normalizePageQuery(query);

    const projectFilter = eq(outputs.projectId, projectId);
    const filter = search
      ? and(projectFilter, ilike(outputs.productId, `%${escapeLikePattern(search)}%`))
      : projectFilter;

    const [totalRows, filteredRows, rows] = await Promise.all([
      db.select({ value: count() }).from(outputs).where(projectFilter),
      search ? db.select({ value: count() }).from(outputs).where(filter) : null,
      db
        .select()
        .from(outputs)
        .where(filter)
        .orderBy(desc(outputs.generatedAt), asc(outputs.productId))
        .limit(limit)
        .offset(offset),
    ]);

    const total = totalRows[0]?.value ?? 0;
    const filtered = filteredRows ? (filteredRows[0]?.value ?? 0) : total;

    return { total, filtered, rows };
  }
}

export const outputStore = new DrizzleOutputStore();

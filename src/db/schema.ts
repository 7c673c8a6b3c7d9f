import { pgTable, uuid, varchar, text, timestamp, jsonb, integer, unique, index } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import type { ImageFormat } from '../utils/mime-types.js';
import type {
  BulkRunResult,
  OutputStatus,
  OverlayRect,
  ProjectStatus,
} from '../types/project.types.js';

/**
 * Frame projects table - template, overlay rectangle, feed and run bookkeeping
 */
/** Longest product id an output row can hold */
export const PRODUCT_ID_MAX_LENGTH = 255;

export const frameProjects = pgTable('frame_projects', {
  id: uuid('id').primaryKey().defaultRandom(),
  /** Opaque owner reference supplied by the authenticating caller */
  ownerId: varchar('owner_id', { length: 255 }).notNull(),
  name: varchar('name', { length: 200 }).notNull(),
  templateKey: text('template_key').notNull(),
  templateFormat: varchar('template_format', { length: 10 }).$type<ImageFormat>().notNull(),
  templateWidth: integer('template_width').notNull(),
  templateHeight: integer('template_height').notNull(),
  templateBytes: integer('template_bytes').notNull(),
  /** Null until set */
  overlayRect: jsonb('overlay_rect').$type<OverlayRect>(),
  feedUrl: text('feed_url').notNull(),
  status: varchar('status', { length: 50 }).$type<ProjectStatus>().notNull().default('draft'),
  /** Set while a bulk run owns the project */
  activeRunId: uuid('active_run_id'),
  totalProducts: integer('total_products').notNull().default(0),
  processedProducts: integer('processed_products').notNull().default(0),
  failedProducts: integer('failed_products').notNull().default(0),
  lastRunResult: jsonb('last_run_result').$type<BulkRunResult>(),
  lastError: text('last_error'),
  processingStartedAt: timestamp('processing_started_at'),
  processingCompletedAt: timestamp('processing_completed_at'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  ownerIdIdx: index('idx_frame_projects_owner_id').on(table.ownerId),
  statusIdx: index('idx_frame_projects_status').on(table.status),
}));

export type FrameProject = typeof frameProjects.$inferSelect;
export type NewFrameProject = typeof frameProjects.$inferInsert;

/**
 * Outputs table - one row per (project, product), overwritten by re-runs
 */
export const outputs = pgTable('outputs', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id')
    .notNull()
    .references(() => frameProjects.id, { onDelete: 'cascade' }),
  productId: varchar('product_id', { length: PRODUCT_ID_MAX_LENGTH }).notNull(),
  sourceImageUrl: text('source_image_url').notNull(),
  imageKey: text('image_key'),
  imageUrl: text('image_url'),
  status: varchar('status', { length: 20 }).$type<OutputStatus>().notNull(),
  reason: text('reason'),
  generatedAt: timestamp('generated_at').notNull().defaultNow(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => ({
  projectProductUnique: unique('outputs_project_product_unique').on(table.projectId, table.productId),
  projectGeneratedIdx: index('idx_outputs_project_generated_at').on(table.projectId, table.generatedAt),
}));

export type Output = typeof outputs.$inferSelect;
export type NewOutput = typeof outputs.$inferInsert;

/**
 * Relations
 */
export const frameProjectsRelations = relations(frameProjects, ({ many }) => ({
  outputs: many(outputs),
}));

export const outputsRelations = relations(outputs, ({ one }) => ({
  project: one(frameProjects, {
    fields: [outputs.projectId],
    references: [frameProjects.id],
  }),
}));

import { z } from 'zod';
import type { ImageFormat } from '../utils/mime-types.js';

/**
 * Frame project status enum
 */
export const ProjectStatus = {
  DRAFT: 'draft',
  COORDINATES_SET: 'coordinates_set',
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type ProjectStatus = (typeof ProjectStatus)[keyof typeof ProjectStatus];

/**
 * Output status enum
 */
export const OutputStatus = {
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
} as const;

export type OutputStatus = (typeof OutputStatus)[keyof typeof OutputStatus];

/**
 * Overlay rectangle in template pixel coordinates
 */
export const overlayRectSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
  width: z.number().int().min(1),
  height: z.number().int().min(1),
});

export type OverlayRect = z.infer<typeof overlayRectSchema>;

const DATA_URI_PREFIX = /^data:[^;,]+;base64,/;
const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Base64 image payload, optionally as a data URI
 */
const base64ImageSchema = z
  .string()
  .min(1)
  .transform((value) => value.replace(DATA_URI_PREFIX, '').replace(/\s+/g, ''))
  .refine((value) => value.length > 0 && BASE64_BODY.test(value), {
    message: 'Must be base64-encoded image data',
  });

/**
 * Create project request schema
 */
export const createProjectSchema = z.object({
  name: z.string().trim().min(1).max(200),
  template: base64ImageSchema,
  feedUrl: z.string().url().optional(),
});

export type CreateProjectRequest = z.infer<typeof createProjectSchema>;

/**
 * Preview request schema. Without an image the first product of the feed is used.
 */
export const previewRequestSchema = z
  .object({
    rect: overlayRectSchema.optional(),
    imageUrl: z.string().url().optional(),
    image: base64ImageSchema.optional(),
  })
  .refine((body) => !(body.imageUrl && body.image), {
    message: 'Provide either imageUrl or image, not both',
    path: ['image'],
  });

export type PreviewRequest = z.infer<typeof previewRequestSchema>;

const clampedLimit = (fallback: number) =>
  z.coerce
    .number()
    .int()
    .default(fallback)
    .transform((value) => Math.min(Math.max(value, 1), 100));

const clampedOffset = z.coerce
  .number()
  .int()
  .default(0)
  .transform((value) => Math.max(value, 0));

/**
 * Output list query params
 */
export const outputsQuerySchema = z.object({
  search: z.string().trim().max(200).optional(),
  offset: clampedOffset,
  limit: clampedLimit(25),
});

export type OutputsQuery = z.infer<typeof outputsQuerySchema>;

/**
 * Project list query params
 */
export const projectListQuerySchema = z.object({
  offset: clampedOffset,
  limit: clampedLimit(20),
});

export type ProjectListQuery = z.infer<typeof projectListQuerySchema>;

/**
 * Frame template as stored alongside the project
 */
export interface TemplateInfo {
  key: string;
  format: ImageFormat;
  width: number;
  height: number;
  bytes: number;
}

/**
 * One product from a feed
 */
export interface ProductRecord {
  productId: string;
  imageUrl: string;
  /** Other scalar child elements of the item, e.g. title or price */
  attributes: Record<string, string>;
}

export const productRecordSchema = z.object({
  productId: z.string().min(1),
  imageUrl: z.string().url(),
  attributes: z.record(z.string()),
});

/**
 * Per-item parse result
 */
export type ParseOutcome =
  | { ok: true; record: ProductRecord }
  | { ok: false; index: number; reason: string };

export interface ParsedFeed {
  records: ProductRecord[];
  warnings: string[];
  outcomes: ParseOutcome[];
}

export interface ItemFailure {
  productId: string;
  reason: string;
}

/**
 * Aggregate result of one bulk run
 */
export interface BulkRunResult {
  projectId: string;
  runId: string;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: ItemFailure[];
  warnings: string[];
  feedError?: string;
  cancelled: boolean;
  durationMs: number;
}

export interface RunProgress {
  processed: number;
  failed: number;
  total: number;
}

/**
 * Bulk run queue job payload
 */
export interface BulkRunJobData {
  projectId: string;
  runId: string;
}

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';

const logger = createChildLogger({ service: 'storage' });

/**
 * HTTP Agent configuration for S3 connections
 * Sized for bulk runs uploading many outputs in parallel
 */
const HTTP_AGENT_CONFIG = {
  keepAlive: true,
  /** Should match or exceed BULK_CONCURRENCY */
  maxSockets: 25,
  keepAliveMsecs: 3000,
  connectionTimeout: 5000,
  socketTimeout: 30000,
} as const;

/** Every project blob lives under this prefix */
export const PROJECTS_PREFIX = 'projects/';

export interface UploadResult {
  key: string;
  url: string;
  size: number;
}

/**
 * Blob operations the pipeline needs; implemented by StorageService
 */
export interface BlobStore {
  uploadBuffer(buffer: Buffer, key: string, contentType?: string): Promise<UploadResult>;
  downloadBuffer(key: string): Promise<Buffer>;
  deletePrefix(prefix: string): Promise<number>;
  getPublicUrl(key: string): string;
}

/**
 * Sanitize a path segment for S3 key usage
 * Removes path traversal attempts and invalid characters
 */
export function sanitizeKeySegment(segment: string): string {
  return (
    segment
      .replace(/\.\./g, '')
      .replace(/^\/+|\/+$/g, '')
      .replace(/\/+/g, '/')
      // Keep alphanumeric, dash, underscore and dot
      .replace(/[^a-zA-Z0-9\-_.]/g, '_')
  );
}

/**
 * Generate S3 key for project blobs
 */
export function getProjectKey(projectId: string, ...parts: string[]): string {
  const sanitizedProjectId = sanitizeKeySegment(projectId);
  const sanitizedParts = parts.map((p) => sanitizeKeySegment(p));
  return [PROJECTS_PREFIX.replace(/\/$/, ''), sanitizedProjectId, ...sanitizedParts].join('/');
}

/**
 * StorageService - S3-compatible blob operations for templates and outputs
 */
export class StorageService implements BlobStore {
  private client: S3Client | null = null;

  /**
   * Initialize S3 client with connection keep-alive
   */
  init(): S3Client {
    if (this.client) {
      return this.client;
    }

    const config = getConfig();

    const missingConfig: string[] = [];
    if (!config.storage.bucket) missingConfig.push('bucket');
    if (!config.storage.region) missingConfig.push('region');
    if (!config.storage.endpoint) missingConfig.push('endpoint');
    if (!config.storage.accessKeyId) missingConfig.push('accessKeyId');
    if (!config.storage.secretAccessKey) missingConfig.push('secretAccessKey');

    if (missingConfig.length > 0) {
      const errorMsg = `Missing required S3 configuration: ${missingConfig.join(', ')}`;
      logger.error({ missingConfig }, errorMsg);
      throw new Error(errorMsg);
    }

    const httpAgent = new HttpAgent({
      keepAlive: HTTP_AGENT_CONFIG.keepAlive,
      maxSockets: HTTP_AGENT_CONFIG.maxSockets,
      keepAliveMsecs: HTTP_AGENT_CONFIG.keepAliveMsecs,
    });

    const httpsAgent = new HttpsAgent({
      keepAlive: HTTP_AGENT_CONFIG.keepAlive,
      maxSockets: HTTP_AGENT_CONFIG.maxSockets,
      keepAliveMsecs: HTTP_AGENT_CONFIG.keepAliveMsecs,
    });

    this.client = new S3Client({
      region: config.storage.region,
      endpoint: config.storage.endpoint,
      credentials: {
        accessKeyId: config.storage.accessKeyId,
        secretAccessKey: config.storage.secretAccessKey,
      },
      forcePathStyle: config.storage.forcePathStyle,
      requestHandler: new NodeHttpHandler({
        httpAgent,
        httpsAgent,
        connectionTimeout: HTTP_AGENT_CONFIG.connectionTimeout,
        socketTimeout: HTTP_AGENT_CONFIG.socketTimeout,
      }),
    });

    logger.info(
      {
        region: config.storage.region,
        endpoint: config.storage.endpoint,
        bucket: config.storage.bucket,
        forcePathStyle: config.storage.forcePathStyle,
      },
      'S3 client initialized with keep-alive'
    );

    return this.client;
  }

  private getBucket(): string {
    return getConfig().storage.bucket;
  }

  /**
   * Upload a buffer to S3
   */
  async uploadBuffer(buffer: Buffer, key: string, contentType = 'application/octet-stream'): Promise<UploadResult> {
    const client = this.init();

    await client.send(
      new PutObjectCommand({
        Bucket: this.getBucket(),
        Key: key,
        Body: buffer,
        ContentType: contentType,
      })
    );

    logger.debug({ key, size: buffer.length }, 'Buffer uploaded to S3');

    return { key, url: this.getPublicUrl(key), size: buffer.length };
  }

  /**
   * Download an object into memory
   */
  async downloadBuffer(key: string): Promise<Buffer> {
    const client = this.init();

    const response = await client.send(
      new GetObjectCommand({
        Bucket: this.getBucket(),
        Key: key,
      })
    );

    if (!response.Body) {
      throw new Error(`No body in S3 response for ${key}`);
    }

    return Buffer.from(await response.Body.transformToByteArray());
  }

  /**
   * Check that the bucket is reachable with the configured credentials
   */
  async ping(): Promise<void> {
    const client = this.init();
    await client.send(new HeadBucketCommand({ Bucket: this.getBucket() }));
  }

  /**
   * List object keys under a prefix (handles pagination for >1000 objects)
   */
  async listFiles(prefix: string): Promise<string[]> {
    const client = this.init();
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: this.getBucket(),
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      keys.push(...(response.Contents || []).map((obj) => obj.Key).filter((key): key is string => !!key));
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  /**
   * Newest modification time under a prefix, or null when it holds nothing
   */
  async lastModified(prefix: string): Promise<Date | null> {
    const client = this.init();
    let newest: Date | null = null;
    let continuationToken: string | undefined;

    do {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: this.getBucket(),
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const obj of response.Contents || []) {
        if (obj.LastModified && (!newest || obj.LastModified > newest)) {
          newest = obj.LastModified;
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return newest;
  }

  /**
   * List the immediate child "directories" of a prefix
   */
  async listPrefixes(prefix: string): Promise<string[]> {
    const client = this.init();
    const prefixes: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: this.getBucket(),
          Prefix: prefix,
          Delimiter: '/',
          ContinuationToken: continuationToken,
        })
      );
      prefixes.push(
        ...(response.CommonPrefixes || []).map((entry) => entry.Prefix).filter((p): p is string => !!p)
      );
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return prefixes;
  }

  /**
   * Get public URL for a key
   * Works with any S3-compatible storage (MinIO, AWS S3, DigitalOcean Spaces, etc.)
   */
  getPublicUrl(key: string): string {
    const config = getConfig();
    const endpoint = config.storage.endpoint.replace(/\/$/, '');

    if (config.storage.forcePathStyle) {
      return `${endpoint}/${config.storage.bucket}/${key}`;
    }

    return `${endpoint}/${key}`;
  }

  /**
   * Delete all objects under a prefix
   */
  async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.listFiles(prefix);
    if (keys.length === 0) return 0;

    const client = this.init();

    // DeleteObjectsCommand supports up to 1000 keys per request
    const batchSize = 1000;
    for (let i = 0; i < keys.length; i += batchSize) {
      const batch = keys.slice(i, i + batchSize);
      const response = await client.send(
        new DeleteObjectsCommand({
          Bucket: this.getBucket(),
          Delete: {
            Objects: batch.map((Key) => ({ Key })),
            Quiet: true,
          },
        })
      );
      if (response.Errors && response.Errors.length > 0) {
        logger.warn(
          { prefix, errorCount: response.Errors.length, errors: response.Errors.slice(0, 5) },
          'Some S3 objects failed to delete'
        );
      }
    }

    logger.info({ prefix, count: keys.length }, 'Deleted all objects under prefix');
    return keys.length;
  }

}

export const storageService = new StorageService();

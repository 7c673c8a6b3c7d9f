import { timingSafeEqual } from 'crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { getConfig } from '../config/index.js';
import { BadRequestError, UnauthorizedError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'auth-middleware' });

const OWNER_HEADER = 'x-owner-id';
const OWNER_ID_PATTERN = /^[A-Za-z0-9_.:@-]{1,255}$/;

// Extend FastifyRequest with the caller's owner reference
declare module 'fastify' {
  interface FastifyRequest {
    ownerId?: string;
  }
}

/**
 * Constant-time string comparison to prevent timing attacks
 * Note: When byte lengths differ, we perform a dummy comparison against itself
 * to maintain constant time execution, preventing timing-based length inference.
 */
function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Check the x-api-key header against the configured keys
 */
export function isValidApiKey(apiKeyHeader: unknown): boolean {
  if (!apiKeyHeader || typeof apiKeyHeader !== 'string') {
    return false;
  }
  return getConfig().auth.apiKeys.some((validKey) => safeCompare(apiKeyHeader, validKey));
}

/**
 * API key authentication. The owner reference is an opaque id supplied by the
 * authenticated caller in x-owner-id; projects are scoped to it.
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  if (!isValidApiKey(request.headers['x-api-key'])) {
    logger.debug({ requestId: request.id, url: request.url }, 'Rejected unauthenticated request');
    const error = new UnauthorizedError('Authentication required');
    reply.status(error.statusCode).send({
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
    });
    return;
  }

  const ownerHeader = request.headers[OWNER_HEADER];
  if (typeof ownerHeader === 'string' && OWNER_ID_PATTERN.test(ownerHeader)) {
    request.ownerId = ownerHeader;
  }
}

/**
 * Owner of the current request
 * @throws BadRequestError when x-owner-id is missing or malformed
 */
export function requireOwnerId(request: FastifyRequest): string {
  if (!request.ownerId) {
    throw new BadRequestError(`${OWNER_HEADER} header is required`, 'OWNER_REQUIRED');
  }
  return request.ownerId;
}

/**
 * Skip auth for certain paths (health checks, docs)
 */
export function shouldSkipAuth(path: string): boolean {
  const config = getConfig();
  return config.auth.skipPaths.some((p) => path.startsWith(p));
}

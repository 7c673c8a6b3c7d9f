import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AlreadyRunningError, AppError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const logger = getLogger();

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const validationError = new ValidationError('Validation failed', error.flatten());
    reply.status(validationError.statusCode).send({
      error: validationError.code,
      message: validationError.message,
      statusCode: validationError.statusCode,
      details: validationError.details,
    } satisfies ErrorResponse);
    return;
  }

  // Handle custom application errors
  if (error instanceof AppError) {
    if (!error.isOperational) {
      logger.error({ err: error, requestId: request.id }, 'Non-operational error occurred');
    } else {
      logger.warn({ code: error.code, message: error.message, requestId: request.id }, 'Operational error occurred');
    }

    const response: ErrorResponse = {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
    };

    if (error instanceof ValidationError && error.details) {
      response.details = error.details;
    }
    if (error instanceof AlreadyRunningError) {
      response.details = { projectId: error.projectId };
    }

    reply.status(error.statusCode).send(response);
    return;
  }

  // Handle Fastify validation errors
  if (error.validation) {
    reply.status(400).send({
      error: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      statusCode: 400,
      details: error.validation,
    } satisfies ErrorResponse);
    return;
  }

  // Fastify client errors (body too large, bad content type, malformed JSON)
  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    reply.status(error.statusCode).send({
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
    } satisfies ErrorResponse);
    return;
  }

  // Unknown errors
  logger.error({ err: error, requestId: request.id }, 'Unhandled error occurred');

  reply.status(500).send({
    error: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  } satisfies ErrorResponse);
}

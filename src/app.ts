import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { errorHandler } from './middleware/error.middleware.js';
import { authMiddleware, shouldSkipAuth } from './middleware/auth.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { projectsRoutes } from './routes/projects.routes.js';

const LOCALHOST_ORIGIN = /^https?:\/\/localhost(:\d+)?$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * An origin is allowed when its host is a configured domain or a subdomain of
 * one. Development also allows localhost.
 */
export function isAllowedOrigin(origin: string, allowedDomains: readonly string[], env: string): boolean {
  const allowed = allowedDomains.some((domain) =>
    new RegExp(`^https?:\\/\\/([a-z0-9-]+\\.)*${escapeRegExp(domain)}(:\\d+)?$`, 'i').test(origin)
  );
  return allowed || (env === 'development' && LOCALHOST_ORIGIN.test(origin));
}

/**
 * Build and configure Fastify application
 */
export async function buildApp(): Promise<FastifyInstance> {
  const config = getConfig();
  const logger = getLogger();

  const app = Fastify({
    logger: false, // We use our own Pino logger
    bodyLimit: config.server.bodyLimitBytes,
    requestIdHeader: 'x-request-id',
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
  });

  await app.register(cors, {
    origin: (origin, callback) => {
      // Requests without an origin (curl, server to server) carry no CORS risk
      if (!origin || isAllowedOrigin(origin, config.cors.allowedDomains, config.server.env)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'), false);
    },
    credentials: true,
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'feedframe API',
        description: 'Frames every product of an XML feed into a template image',
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${config.server.port}`,
          description: 'Development server',
        },
      ],
      components: {
        securitySchemes: {
          apiKey: {
            type: 'apiKey',
            name: 'x-api-key',
            in: 'header',
          },
        },
      },
      security: [{ apiKey: [] }],
      tags: [
        { name: 'Projects', description: 'Frame templates, overlay rectangles and previews' },
        { name: 'Runs', description: 'Bulk runs over the product feed' },
        { name: 'Outputs', description: 'Generated images per product' },
        { name: 'Health', description: 'Probes' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Auth middleware (skip for health routes)
  app.addHook('preHandler', async (request, reply) => {
    if (shouldSkipAuth(request.url)) {
      return;
    }
    await authMiddleware(request, reply);
  });

  // Error handler
  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(healthRoutes);
  await app.register(projectsRoutes, { prefix: '/api/v1' });

  return app;
}

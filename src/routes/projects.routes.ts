import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { projectsController } from '../controllers/projects.controller.js';
import { requireOwnerId } from '../middleware/auth.middleware.js';
import {
  createProjectSchema,
  outputsQuerySchema,
  overlayRectSchema,
  previewRequestSchema,
  projectListQuerySchema,
} from '../types/project.types.js';

const projectIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const idParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', format: 'uuid' },
  },
} as const;

const rectProperties = {
  x: { type: 'integer', minimum: 0 },
  y: { type: 'integer', minimum: 0 },
  width: { type: 'integer', minimum: 1 },
  height: { type: 'integer', minimum: 1 },
} as const;

/**
 * Frame project routes
 */
export async function projectsRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * Create a project from a frame template
   */
  fastify.post(
    '/projects',
    {
      schema: {
        description: 'Create a frame project. The template is base64 (a data URI is accepted).',
        tags: ['Projects'],
        body: {
          type: 'object',
          required: ['name', 'template'],
          properties: {
            name: { type: 'string', maxLength: 200 },
            template: { type: 'string' },
            feedUrl: { type: 'string', format: 'uri' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const validated = createProjectSchema.parse(request.body);
      const project = await projectsController.createProject(ownerId, validated);
      return reply.status(201).send(project);
    }
  );

  /**
   * List projects of the caller
   */
  fastify.get(
    '/projects',
    {
      schema: {
        description: 'List frame projects, newest first',
        tags: ['Projects'],
        querystring: {
          type: 'object',
          properties: {
            limit: { type: 'number', default: 20 },
            offset: { type: 'number', default: 0 },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const query = projectListQuerySchema.parse(request.query);
      return reply.send(await projectsController.listProjects(ownerId, query));
    }
  );

  /**
   * Get project by ID
   */
  fastify.get(
    '/projects/:id',
    {
      schema: {
        description: 'Get a frame project',
        tags: ['Projects'],
        params: idParams,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      return reply.send(await projectsController.getProject(id, ownerId));
    }
  );

  /**
   * Set the overlay rectangle
   */
  fastify.put(
    '/projects/:id/rect',
    {
      schema: {
        description: 'Set the overlay rectangle in template pixels',
        tags: ['Projects'],
        params: idParams,
        body: {
          type: 'object',
          required: ['x', 'y', 'width', 'height'],
          properties: rectProperties,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      const rect = overlayRectSchema.parse(request.body);
      return reply.send(await projectsController.setOverlayRect(id, ownerId, rect));
    }
  );

  /**
   * Render a single preview composite
   */
  fastify.post(
    '/projects/:id/preview',
    {
      schema: {
        description: 'Preview one composite. Without image or imageUrl the first feed product is used.',
        tags: ['Projects'],
        params: idParams,
        body: {
          type: 'object',
          properties: {
            rect: { type: 'object', properties: rectProperties },
            imageUrl: { type: 'string', format: 'uri' },
            image: { type: 'string' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      const body = previewRequestSchema.parse(request.body ?? {});
      return reply.send(await projectsController.preview(id, ownerId, body));
    }
  );

  /**
   * Trigger a bulk run
   */
  fastify.post(
    '/projects/:id/runs',
    {
      schema: {
        description: 'Start a bulk run over the feed. Rejected with 409 while a run is active.',
        tags: ['Runs'],
        params: idParams,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      const accepted = await projectsController.triggerRun(id, ownerId);
      return reply.status(202).send(accepted);
    }
  );

  /**
   * Run status (lightweight)
   */
  fastify.get(
    '/projects/:id/run',
    {
      schema: {
        description: 'Progress and result of the latest run',
        tags: ['Runs'],
        params: idParams,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      return reply.send(await projectsController.getRunStatus(id, ownerId));
    }
  );

  /**
   * List outputs
   */
  fastify.get(
    '/projects/:id/outputs',
    {
      schema: {
        description: 'Page through outputs, newest first, with an optional product id search',
        tags: ['Outputs'],
        params: idParams,
        querystring: {
          type: 'object',
          properties: {
            search: { type: 'string' },
            limit: { type: 'number', default: 25 },
            offset: { type: 'number', default: 0 },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      const query = outputsQuerySchema.parse(request.query);
      return reply.send(await projectsController.listOutputs(id, ownerId, query));
    }
  );

  /**
   * Delete project
   */
  fastify.delete(
    '/projects/:id',
    {
      schema: {
        description: 'Delete a project with its outputs and blobs. An active run is abandoned.',
        tags: ['Projects'],
        params: idParams,
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ownerId = requireOwnerId(request);
      const { id } = projectIdParamsSchema.parse(request.params);
      await projectsController.deleteProject(id, ownerId);
      return reply.status(204).send();
    }
  );
}

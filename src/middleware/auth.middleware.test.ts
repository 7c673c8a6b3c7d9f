import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { FastifyRequest, FastifyReply } from 'fastify';

// Mock the config module
vi.mock('../config/index.js', () => ({
  getConfig: vi.fn(() => ({
    auth: {
      apiKeys: ['valid-config-key'],
      skipPaths: ['/health', '/ready', '/docs'],
    },
  })),
}));

// Mock logger
vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { authMiddleware, isValidApiKey, requireOwnerId, shouldSkipAuth } from './auth.middleware.js';
import { BadRequestError } from '../utils/errors.js';

describe('auth.middleware', () => {
  describe('shouldSkipAuth', () => {
    it('should return true for /health', () => {
      expect(shouldSkipAuth('/health')).toBe(true);
    });

    it('should return true for /health/storage', () => {
      expect(shouldSkipAuth('/health/storage')).toBe(true);
    });

    it('should return true for /ready', () => {
      expect(shouldSkipAuth('/ready')).toBe(true);
    });

    it('should return true for /docs/json', () => {
      expect(shouldSkipAuth('/docs/json')).toBe(true);
    });

    it('should return false for /api/v1/projects', () => {
      expect(shouldSkipAuth('/api/v1/projects')).toBe(false);
    });
  });

  describe('isValidApiKey', () => {
    it('should accept a configured key', () => {
      expect(isValidApiKey('valid-config-key')).toBe(true);
    });

    it('should reject substrings, extensions and case changes', () => {
      expect(isValidApiKey('valid-config')).toBe(false);
      expect(isValidApiKey('valid-config-key-extra')).toBe(false);
      expect(isValidApiKey('VALID-CONFIG-KEY')).toBe(false);
    });

    it('should reject a non-ASCII key of the same string length', () => {
      // 16 characters, 17 bytes in UTF-8
      expect(isValidApiKey('valid-config-kéy')).toBe(false);
    });

    it('should reject non-string values', () => {
      expect(isValidApiKey(undefined)).toBe(false);
      expect(isValidApiKey(['valid-config-key'])).toBe(false);
    });
  });

  describe('authMiddleware', () => {
    let mockRequest: Partial<FastifyRequest>;
    let mockReply: Partial<FastifyReply>;

    beforeEach(() => {
      mockRequest = {
        id: 'req-1',
        url: '/api/v1/projects',
        headers: {},
      };
      mockReply = {
        status: vi.fn().mockReturnThis(),
        send: vi.fn().mockReturnThis(),
      };
    });

    it('should pass a valid API key and attach the owner', async () => {
      mockRequest.headers = { 'x-api-key': 'valid-config-key', 'x-owner-id': 'owner-1' };

      await authMiddleware(mockRequest as FastifyRequest, mockReply as FastifyReply);

      expect(mockReply.status).not.toHaveBeenCalled();
      expect(mockRequest.ownerId).toBe('owner-1');
    });

    it('should return 401 for a missing API key', async () => {
      await authMiddleware(mockRequest as FastifyRequest, mockReply as FastifyReply);

      expect(mockReply.status).toHaveBeenCalledWith(401);
      expect(mockReply.send).toHaveBeenCalledWith({
        error: 'UNAUTHORIZED',
        message: 'Authentication required',
        statusCode: 401,
      });
    });

    it('should return 401 for an invalid API key', async () => {
      mockRequest.headers = { 'x-api-key': 'invalid-key', 'x-owner-id': 'owner-1' };

      await authMiddleware(mockRequest as FastifyRequest, mockReply as FastifyReply);

      expect(mockReply.status).toHaveBeenCalledWith(401);
      expect(mockRequest.ownerId).toBeUndefined();
    });

    it('should ignore a malformed owner header', async () => {
      mockRequest.headers = { 'x-api-key': 'valid-config-key', 'x-owner-id': 'owner with spaces' };

      await authMiddleware(mockRequest as FastifyRequest, mockReply as FastifyReply);

      expect(mockReply.status).not.toHaveBeenCalled();
      expect(mockRequest.ownerId).toBeUndefined();
    });
  });

  describe('requireOwnerId', () => {
    it('should return the owner of the request', () => {
      expect(requireOwnerId({ ownerId: 'owner-1' } as FastifyRequest)).toBe('owner-1');
    });

    it('should throw without an owner', () => {
      expect(() => requireOwnerId({} as FastifyRequest)).toThrow(BadRequestError);
      expect(() => requireOwnerId({} as FastifyRequest)).toThrow('x-owner-id header is required');
    });
  });
});

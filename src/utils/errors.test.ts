import { describe, it, expect } from 'vitest';
import {
  AppError,
  BadRequestError,
  UnauthorizedError,
  NotFoundError,
  ConflictError,
  AlreadyRunningError,
  ValidationError,
  UnsafeUrlError,
  ConfigurationError,
  BoundsError,
  FetchFailedError,
  FeedError,
  CompositeError,
  InternalError,
  errorMessage,
} from './errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('should create error with all properties', () => {
      const error = new AppError('Test message', 400, 'TEST_CODE', true);

      expect(error.message).toBe('Test message');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('TEST_CODE');
      expect(error.isOperational).toBe(true);
      expect(error.stack).toBeDefined();
    });

    it('should default isOperational to true', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error.isOperational).toBe(true);
    });

    it('should be instance of Error', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });
  });

  describe('HTTP errors', () => {
    it('should create 400 error with default message', () => {
      const error = new BadRequestError();
      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Bad request');
      expect(error.code).toBe('BAD_REQUEST');
    });

    it('should create 401 error', () => {
      expect(new UnauthorizedError().statusCode).toBe(401);
    });

    it('should create 404 error with custom message', () => {
      const error = new NotFoundError('Project p-1 not found');
      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Project p-1 not found');
    });

    it('should create 409 error', () => {
      expect(new ConflictError().statusCode).toBe(409);
    });

    it('should mark InternalError as non-operational', () => {
      const error = new InternalError();
      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(false);
    });
  });

  describe('AlreadyRunningError', () => {
    it('should be a 409 conflict naming the project', () => {
      const error = new AlreadyRunningError('proj-1');

      expect(error).toBeInstanceOf(ConflictError);
      expect(error.statusCode).toBe(409);
      expect(error.code).toBe('ALREADY_RUNNING');
      expect(error.projectId).toBe('proj-1');
      expect(error.message).toBe('A bulk run is already active for project proj-1');
    });
  });

  describe('ValidationError', () => {
    it('should carry details', () => {
      const error = new ValidationError('Bad body', { field: 'name' });
      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual({ field: 'name' });
    });

    it('should type unsafe URLs as validation errors', () => {
      const error = new UnsafeUrlError('http://10.0.0.1/', 'Address 10.0.0.1 is in a blocked range (private)');

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.code).toBe('UNSAFE_URL');
      expect(error.url).toBe('http://10.0.0.1/');
      expect(error.details).toEqual({ url: 'http://10.0.0.1/' });
    });
  });

  describe('ConfigurationError', () => {
    it('should type bounds errors as configuration errors', () => {
      const error = new BoundsError('too wide');

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('OUT_OF_BOUNDS');
    });
  });

  describe('fetch and feed errors', () => {
    it('should keep the HTTP status on fetch failures', () => {
      const error = new FetchFailedError('https://cdn.example.com/a.jpg', 'HTTP 404', 404);
      expect(error.statusCode).toBe(502);
      expect(error.status).toBe(404);
      expect(error.url).toBe('https://cdn.example.com/a.jpg');
    });

    it('should keep the feed URL on feed errors', () => {
      const error = new FeedError('https://feeds.example.com/f.xml', 'Malformed XML');
      expect(error.code).toBe('FEED_ERROR');
      expect(error.feedUrl).toBe('https://feeds.example.com/f.xml');
    });
  });

  describe('CompositeError', () => {
    it('should derive the code from the failure kind', () => {
      const error = new CompositeError('decode_failed', 'Unsupported image');
      expect(error.kind).toBe('decode_failed');
      expect(error.code).toBe('DECODE_FAILED');
    });
  });

  describe('errorMessage', () => {
    it('should read messages from errors and stringify other values', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});

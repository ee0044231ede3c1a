import { describe, it, expect } from 'vitest';
import {
  createApiError,
  AppError,
  invalidRequest,
  rateLimited,
  notFound,
  internalError,
} from '../src/utils/errors';

describe('Error utilities', () => {
  describe('createApiError', () => {
    it('should create error with required fields', () => {
      const error = createApiError('invalid_request', 'Test message');

      expect(error.error.code).toBe('invalid_request');
      expect(error.error.message).toBe('Test message');
      expect(error.error.trace_id.length).toBeGreaterThan(0);
      expect(error.error.retry_after).toBeUndefined();
      expect(error.error.issues).toBeUndefined();
    });

    it('should include retry_after when provided', () => {
      const error = createApiError('rate_limited', 'Too many requests', 60);

      expect(error.error.retry_after).toBe(60);
    });

    it('should include validation issues when provided', () => {
      const error = createApiError('invalid_request', 'Bad body', undefined, ['samples: Required']);

      expect(error.error.issues).toEqual(['samples: Required']);
    });

    it('should omit an empty issue list', () => {
      const error = createApiError('invalid_request', 'Bad body', undefined, []);

      expect(error.error.issues).toBeUndefined();
    });
  });

  describe('AppError', () => {
    it('should create error with all properties', () => {
      const error = new AppError('invalid_request', 'Invalid body', 400);

      expect(error.code).toBe('invalid_request');
      expect(error.message).toBe('Invalid body');
      expect(error.statusCode).toBe(400);
      expect(error.name).toBe('AppError');
      expect(error.traceId.length).toBeGreaterThan(0);
    });

    it('should serialize to JSON with its own trace id', () => {
      const error = new AppError('rate_limited', 'Too many', 429, 30);
      const json = error.toJSON();

      expect(json.error.code).toBe('rate_limited');
      expect(json.error.message).toBe('Too many');
      expect(json.error.retry_after).toBe(30);
      expect(json.error.trace_id).toBe(error.traceId);
    });
  });

  describe('Error factory functions', () => {
    it('invalidRequest should return 400 error', () => {
      const error = invalidRequest('Bad input', ['kind: Invalid enum value']);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('invalid_request');
      expect(error.issues).toEqual(['kind: Invalid enum value']);
    });

    it('rateLimited should return 429 error with retry_after', () => {
      const error = rateLimited(60);
      expect(error.statusCode).toBe(429);
      expect(error.code).toBe('rate_limited');
      expect(error.retryAfter).toBe(60);
    });

    it('notFound should return 404 error naming the path', () => {
      const error = notFound('/nope');
      expect(error.statusCode).toBe(404);
      expect(error.code).toBe('not_found');
      expect(error.message).toBe('No route for /nope');
    });

    it('internalError should return 500 error', () => {
      const error = internalError();
      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('internal_error');
      expect(error.message).toBe('An internal error occurred.');
    });
  });
});

/**
 * Tests for error handler middleware (src/server/middleware/error-handler.ts).
 */

import Fastify from 'fastify';
import { describe, expect, it } from 'vitest';
import errorHandler from '../../src/server/middleware/error-handler.js';
import { AppError, ValidationError } from '../../src/utils/errors.js';

describe('errorHandler', () => {
  it('should handle AppError with correct statusCode and code', async () => {
    const app = Fastify({ logger: false });
    app.register(errorHandler);

    app.get('/test', () => {
      throw new ValidationError('test validation error');
    });

    const response = await app.inject({ method: 'GET', url: '/test' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'VALIDATION_ERROR', message: 'test validation error', statusCode: 400 },
    });
  });

  it('should handle Fastify validation errors', async () => {
    const app = Fastify({ logger: false });
    app.register(errorHandler);

    app.post(
      '/test',
      {
        schema: {
          body: {
            type: 'object',
            required: ['name'],
            properties: {
              name: { type: 'string' },
            },
          },
        },
      },
      async () => {
        return { ok: true };
      },
    );

    const response = await app.inject({ method: 'POST', url: '/test', payload: {} });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.ok).toBe(false);
    expect(body.error.code).toBe('VALIDATION_ERROR');
  });

  it('should handle unexpected errors with 500', async () => {
    const app = Fastify({ logger: false });
    app.register(errorHandler);

    app.get('/test', () => {
      throw new Error('unexpected error');
    });

    const response = await app.inject({ method: 'GET', url: '/test' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', statusCode: 500 },
    });
  });

  it('should handle AppError subtypes with their statusCodes', async () => {
    const app = Fastify({ logger: false });
    app.register(errorHandler);

    app.get('/test', () => {
      throw new AppError('custom error', 403, 'FORBIDDEN');
    });

    const response = await app.inject({ method: 'GET', url: '/test' });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.code).toBe('FORBIDDEN');
  });

  it('should answer unknown routes with ROUTE_NOT_FOUND', async () => {
    const app = Fastify({ logger: false });
    app.register(errorHandler);

    const response = await app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json().error).toEqual({
      code: 'ROUTE_NOT_FOUND',
      message: 'Route GET /missing not found',
      statusCode: 404,
    });
  });
});

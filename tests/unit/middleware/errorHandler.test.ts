import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';

// ── Mock logger ─────────────────────────────────────────────────────

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const { registerErrorHandler } = await import('../../../src/middleware/errorHandler.js');
const { AIError, PayloadTooLargeError, PoolExhaustedError, TimeoutError, ValidationError } = await import(
  '../../../src/utils/errors.js'
);
const { logger } = await import('../../../src/utils/logger.js');

// ── Helpers ─────────────────────────────────────────────────────────

async function buildApp(errorToThrow: Error): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, bodyLimit: 64 });
  registerErrorHandler(app);

  app.get('/test', async () => {
    throw errorToThrow;
  });

  app.post<{ Body: { name: string } }>(
    '/validated',
    {
      schema: {
        body: {
          type: 'object',
          required: ['name'],
          properties: { name: { type: 'string' } },
        },
      },
    },
    async (request) => ({ name: request.body.name }),
  );

  await app.ready();
  return app;
}

// ── Tests ───────────────────────────────────────────────────────────

describe('errorHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('AppError subclasses', () => {
    it('maps ValidationError to 400', async () => {
      const app = await buildApp(new ValidationError('Question cannot be empty'));

      const response = await app.inject({ method: 'GET', url: '/test' });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Question cannot be empty' },
      });
    });

    it('maps TimeoutError to 504', async () => {
      const app = await buildApp(new TimeoutError('Query execution', 11000));

      const response = await app.inject({ method: 'GET', url: '/test' });

      expect(response.statusCode).toBe(504);
      expect(JSON.parse(response.body).error).toEqual({
        code: 'TIMEOUT',
        message: 'Query execution did not finish within 11000ms',
      });
    });

    it('maps PoolExhaustedError to 503', async () => {
      const app = await buildApp(new PoolExhaustedError());

      const response = await app.inject({ method: 'GET', url: '/test' });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body).error.code).toBe('POOL_EXHAUSTED');
    });

    it('maps PayloadTooLargeError to 413', async () => {
      const app = await buildApp(new PayloadTooLargeError(2048, 1024));

      const response = await app.inject({ method: 'GET', url: '/test' });

      expect(response.statusCode).toBe(413);
      expect(JSON.parse(response.body).error.message).toBe('File is 2048 bytes; the limit is 1024 bytes');
    });

    it('maps AIError to 502 and logs a warning', async () => {
      const app = await buildApp(new AIError('OpenAI returned an empty response'));

      const response = await app.inject({ method: 'GET', url: '/test' });

      expect(response.statusCode).toBe(502);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ code: 'AI_ERROR' }),
        'Operational error: OpenAI returned an empty response',
      );
    });
  });

  describe('framework errors', () => {
    it('maps schema validation failures to 400 VALIDATION_ERROR', async () => {
      const app = await buildApp(new Error('unused'));

      const response = await app.inject({ method: 'POST', url: '/validated', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });

    it('maps an oversized body to 413 PAYLOAD_TOO_LARGE', async () => {
      const app = await buildApp(new Error('unused'));

      const response = await app.inject({
        method: 'POST',
        url: '/validated',
        payload: { name: 'x'.repeat(200) },
      });

      expect(response.statusCode).toBe(413);
      expect(JSON.parse(response.body).error.code).toBe('PAYLOAD_TOO_LARGE');
    });
  });

  describe('unexpected errors', () => {
    it('hides the message behind a generic 500', async () => {
      const app = await buildApp(new Error('secret internals'));

      const response = await app.inject({ method: 'GET', url: '/test' });

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
      });
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error) }),
        'Unexpected error: secret internals',
      );
    });
  });

  describe('not found', () => {
    it('returns 404 for unknown routes', async () => {
      const app = await buildApp(new Error('unused'));

      const response = await app.inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Route not found' },
      });
    });
  });
});

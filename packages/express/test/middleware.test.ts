/**
 * Tests for Express middleware.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import express, { type Express, type Request, type Response } from 'express';
import request from 'supertest';
import { DataEngine, DuplicateKeyError, MemoryStorageBackend, UnknownFieldError } from '@automap/core';
import { usersModel } from '@automap/core/test';
import {
  createContextMiddleware,
  createErrorHandler,
  asyncHandler,
  requireAutomapContext,
  RequestError,
} from '../src/middleware';

function createTestApp(): Express {
  const app = express();
  app.use(express.json());
  return app;
}

function createEngine(): DataEngine {
  return new DataEngine(new MemoryStorageBackend(), [usersModel], { defaultNamespace: 'main' });
}

describe('Middleware', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createContextMiddleware', () => {
    it('attaches automap context to request', async () => {
      const app = createTestApp();
      app.use(createContextMiddleware(createEngine()));

      app.get('/test', (req: Request, res: Response) => {
        res.json({
          hasEngine: !!req.automap?.engine,
          namespace: req.automap?.namespace,
          scopeNamespace: req.automap?.scope.namespace,
        });
      });

      const response = await request(app).get('/test');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ hasEngine: true, namespace: 'main', scopeNamespace: 'main' });
    });

    it('reads the namespace header', async () => {
      const app = createTestApp();
      app.use(createContextMiddleware(createEngine()));

      app.get('/test', (req: Request, res: Response) => {
        res.json({ namespace: req.automap?.namespace });
      });

      const response = await request(app).get('/test').set('X-Namespace', 'tenant_b');

      expect(response.body.namespace).toBe('tenant_b');
    });

    it('extracts metadata using getMetadata option', async () => {
      const app = createTestApp();

      app.use(
        createContextMiddleware(createEngine(), {
          getMetadata: (req) => ({
            userAgent: req.headers['user-agent'],
            custom: 'value',
          }),
        })
      );

      app.get('/test', (req: Request, res: Response) => {
        res.json({ metadata: req.automap?.metadata });
      });

      const response = await request(app).get('/test').set('User-Agent', 'test-agent');

      expect(response.body.metadata).toEqual({ userAgent: 'test-agent', custom: 'value' });
    });

    it('provides empty metadata by default', async () => {
      const app = createTestApp();
      app.use(createContextMiddleware(createEngine()));

      app.get('/test', (req: Request, res: Response) => {
        res.json({ metadata: req.automap?.metadata });
      });

      const response = await request(app).get('/test');

      expect(response.body.metadata).toEqual({});
    });
  });

  describe('createErrorHandler', () => {
    it('handles unknown errors with 500 status and logs them', async () => {
      const log = vi.spyOn(console, 'error').mockImplementation(() => {});
      const app = createTestApp();

      app.get('/error', () => {
        throw new Error('Test error');
      });

      app.use(createErrorHandler());

      const response = await request(app).get('/error');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'Test error' } });
      expect(log).toHaveBeenCalledTimes(1);
    });

    it('maps field errors to 400', async () => {
      const app = createTestApp();

      app.get('/error', () => {
        throw new UnknownFieldError('users', 'email');
      });

      app.use(createErrorHandler());

      const response = await request(app).get('/error');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: { code: 'UNKNOWN_FIELD', message: 'Model "users" has no field "email"' },
      });
    });

    it('maps duplicates to 409', async () => {
      const app = createTestApp();

      app.get('/error', () => {
        throw new DuplicateKeyError('users', 'name', 'Alice');
      });

      app.use(createErrorHandler());

      const response = await request(app).get('/error');

      expect(response.status).toBe(409);
      expect(response.body.error.message).toBe('Duplicate value "Alice" for unique field "users.name"');
    });

    it('includes request error details', async () => {
      const app = createTestApp();

      app.get('/error', () => {
        throw new RequestError('Bad body', [{ path: '/limit' }]);
      });

      app.use(createErrorHandler());

      const response = await request(app).get('/error');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: { code: 'INVALID_REQUEST', message: 'Bad body', details: [{ path: '/limit' }] },
      });
    });
  });

  describe('asyncHandler', () => {
    it('catches async errors and forwards to error handler', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const app = createTestApp();

      app.get(
        '/async-error',
        asyncHandler(async () => {
          throw new Error('Async error');
        })
      );

      app.use(createErrorHandler());

      const response = await request(app).get('/async-error');

      expect(response.status).toBe(500);
      expect(response.body.error.message).toBe('Async error');
    });

    it('passes through successful responses', async () => {
      const app = createTestApp();

      app.get(
        '/async-success',
        asyncHandler(async (_req: Request, res: Response) => {
          res.json({ success: true });
        })
      );

      const response = await request(app).get('/async-success');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
    });
  });

  describe('requireAutomapContext', () => {
    it('throws if context is missing', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const app = createTestApp();

      app.get('/test', (req: Request, res: Response) => {
        requireAutomapContext(req);
        res.json({ ok: true });
      });

      app.use(createErrorHandler());

      const response = await request(app).get('/test');

      expect(response.status).toBe(500);
      expect(response.body.error.message).toBe('automap context not attached. Did you forget the middleware?');
    });

    it('passes if context is present', async () => {
      const app = createTestApp();
      app.use(createContextMiddleware(createEngine()));

      app.get('/test', (req: Request, res: Response) => {
        requireAutomapContext(req);
        res.json({ namespace: req.automap.namespace });
      });

      const response = await request(app).get('/test');

      expect(response.body).toEqual({ namespace: 'main' });
    });
  });
});

/**
 * Route Helpers Tests
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { safeKeyCompare, apiResponse, apiError, ERROR_CODES } from './helpers.js';

function createApp() {
  const app = new Hono();
  app.use('*', async (c, next) => {
    c.set('requestId', 'req-1');
    await next();
  });
  app.get('/ok', (c) => apiResponse(c, { value: 1 }));
  app.get('/created', (c) => apiResponse(c, { value: 2 }, 201));
  app.get('/default-status', (c) =>
    apiError(c, { code: ERROR_CODES.INVALID_REQUEST, message: 'Something broke' })
  );
  app.get('/coded-error', (c) =>
    apiError(c, { code: ERROR_CODES.UNAUTHORIZED, message: 'Token mismatch' }, 401)
  );
  return app;
}

describe('Route Helpers', () => {
  describe('safeKeyCompare', () => {
    it('matches identical strings', () => {
      expect(safeKeyCompare('test-secret', 'test-secret')).toBe(true);
    });

    it('rejects different strings of the same length', () => {
      expect(safeKeyCompare('test-secret', 'test-secreT')).toBe(false);
    });

    it('rejects strings of different length', () => {
      expect(safeKeyCompare('test-secret', 'test')).toBe(false);
    });

    it.each([
      [undefined, 'test-secret'],
      ['test-secret', undefined],
      ['', ''],
    ])('rejects empty values (%s, %s)', (a, b) => {
      expect(safeKeyCompare(a, b)).toBe(false);
    });
  });

  describe('apiResponse', () => {
    it('wraps data in the success envelope', async () => {
      const res = await createApp().request('/ok');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        data: { value: 1 },
        meta: { requestId: 'req-1', timestamp: expect.any(String) },
      });
    });

    it('uses the given status', async () => {
      const res = await createApp().request('/created');
      expect(res.status).toBe(201);
    });
  });

  describe('apiError', () => {
    it('defaults to status 400', async () => {
      const res = await createApp().request('/default-status');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'INVALID_REQUEST', message: 'Something broke' },
        meta: { requestId: 'req-1', timestamp: expect.any(String) },
      });
    });

    it('uses the given code and status', async () => {
      const res = await createApp().request('/coded-error');

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        error: { code: 'UNAUTHORIZED', message: 'Token mismatch' },
      });
    });
  });
});

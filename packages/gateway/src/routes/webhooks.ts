/**
 * Webhook Routes
 *
 * KOOK posts each event to the configured callback URL as a single
 * request and retries on a non-2xx status. The first request after the
 * URL is saved is a verification challenge that must be echoed back.
 */

import { Hono } from 'hono';
import { AuthenticationError, DecodeError, decompress, getErrorMessage } from '@kookgate/core';
import type { WebhookReceiver } from '../webhook/receiver.js';
import { getLog } from '../services/log.js';
import { apiError, apiResponse, ERROR_CODES } from './helpers.js';

const log = getLog('Webhooks');

const COMPRESSED_ENCODINGS = new Set(['deflate', 'gzip']);

export interface WebhookRouteOptions {
  receiver: WebhookReceiver;
  /** Inflate bodies sent with Content-Encoding deflate or gzip */
  decompress: boolean;
}

export function createWebhookRoutes(options: WebhookRouteOptions): Hono {
  const { receiver } = options;
  const routes = new Hono();

  /**
   * POST /
   *
   * 200 { challenge } for a verification request, 200 envelope for an event
   */
  routes.post('/', async (c) => {
    const raw = new Uint8Array(await c.req.arrayBuffer());
    const encoding = c.req.header('Content-Encoding')?.trim().toLowerCase();

    let text: string;
    if (options.decompress && encoding && COMPRESSED_ENCODINGS.has(encoding)) {
      const inflated = decompress(raw);
      if (!inflated.ok) {
        log.warn('Could not decompress webhook body', { encoding, error: inflated.error.message });
        return apiError(
          c,
          { code: ERROR_CODES.DECOMPRESSION_FAILED, message: 'Could not decompress request body' },
          400
        );
      }
      text = inflated.value;
    } else {
      text = Buffer.from(raw).toString('utf8');
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      log.warn('Webhook body is not valid JSON', { length: text.length });
      return apiError(
        c,
        { code: ERROR_CODES.INVALID_REQUEST, message: 'Invalid JSON in request body' },
        400
      );
    }

    try {
      const outcome = await receiver.handle(body);
      if (outcome.type === 'challenge') {
        return c.json({ challenge: outcome.challenge });
      }
      return apiResponse(c, { sn: outcome.sequence, duplicate: outcome.duplicate });
    } catch (error) {
      if (error instanceof AuthenticationError) {
        return apiError(c, { code: ERROR_CODES.UNAUTHORIZED, message: error.message }, 401);
      }
      if (error instanceof DecodeError) {
        return apiError(c, { code: ERROR_CODES.INVALID_REQUEST, message: error.message }, 400);
      }
      log.error('Webhook event processing failed', { error: getErrorMessage(error) });
      return apiError(
        c,
        { code: ERROR_CODES.EVENT_PROCESSING_FAILED, message: 'Event processing failed' },
        500
      );
    }
  });

  return routes;
}

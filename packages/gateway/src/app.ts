/**
 * Hono application setup
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import type { GatewayConfig, WebhookEventSink } from './types/index.js';
import { requestId, timing, errorHandler, notFoundHandler } from './middleware/index.js';
import { createHealthRoutes, createWebhookRoutes } from './routes/index.js';
import { apiError, ERROR_CODES } from './routes/helpers.js';
import { WebhookReceiver } from './webhook/receiver.js';
import {
  BODY_SIZE_LIMIT_BYTES,
  WEBHOOK_DEDUP_CAPACITY,
  WEBHOOK_HOST,
  WEBHOOK_PATH,
  WEBHOOK_PORT,
} from './config/defaults.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    startTime: number;
  }
}

/**
 * Default configuration. With an empty verify token every challenge is
 * rejected, so a token must be configured before KOOK can verify the URL.
 */
const DEFAULT_CONFIG: GatewayConfig = {
  host: WEBHOOK_HOST,
  port: WEBHOOK_PORT,
  webhookPath: WEBHOOK_PATH,
  verifyToken: '',
  decompress: true,
  dedupCapacity: WEBHOOK_DEDUP_CAPACITY,
  bodyLimitBytes: BODY_SIZE_LIMIT_BYTES,
};

export interface GatewayApp {
  app: Hono;
  receiver: WebhookReceiver;
  config: GatewayConfig;
}

/**
 * Create the Hono application serving the webhook and health routes
 */
export function createApp(sink: WebhookEventSink, config: Partial<GatewayConfig> = {}): GatewayApp {
  const fullConfig: GatewayConfig = { ...DEFAULT_CONFIG, ...config };
  const receiver = new WebhookReceiver({
    verifyToken: fullConfig.verifyToken,
    sink,
    dedupCapacity: fullConfig.dedupCapacity,
  });

  const app = new Hono();

  app.use('*', secureHeaders());

  app.use(
    '*',
    bodyLimit({
      maxSize: fullConfig.bodyLimitBytes,
      onError: (c) =>
        apiError(
          c,
          {
            code: ERROR_CODES.PAYLOAD_TOO_LARGE,
            message: `Request body exceeds ${fullConfig.bodyLimitBytes} bytes`,
          },
          413
        ),
    })
  );

  // Request ID
  app.use('*', requestId);

  // Timing
  app.use('*', timing);

  // Logger (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    app.use('*', logger());
  }

  // Mount routes
  app.route('/health', createHealthRoutes({ receiver, webhookPath: fullConfig.webhookPath }));
  app.route(
    `/${fullConfig.webhookPath}`,
    createWebhookRoutes({ receiver, decompress: fullConfig.decompress })
  );

  // Error handlers
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return { app, receiver, config: fullConfig };
}

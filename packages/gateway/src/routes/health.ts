/**
 * Health check routes
 */

import { Hono } from 'hono';
import type { HealthStatus } from '../types/index.js';
import type { WebhookReceiver } from '../webhook/receiver.js';
import { apiResponse } from './helpers.js';

export interface HealthRouteOptions {
  receiver: WebhookReceiver;
  webhookPath: string;
}

export function createHealthRoutes(options: HealthRouteOptions): Hono {
  const startTime = Date.now();
  const routes = new Hono();

  routes.get('/', (c) => {
    const health: HealthStatus = {
      status: 'healthy',
      uptime: (Date.now() - startTime) / 1000,
      webhook: {
        path: `/${options.webhookPath}`,
        seenSequences: options.receiver.seenCount,
      },
    };
    return apiResponse(c, health);
  });

  return routes;
}

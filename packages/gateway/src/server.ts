/**
 * HTTP server for the webhook receiver
 */

import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import type { GatewayConfig, WebhookEventSink } from './types/index.js';
import { getLog } from './services/log.js';

const log = getLog('Server');

export interface WebhookServer {
  /** Address actually bound, known once listening */
  readonly url: Promise<string>;
  close(): Promise<void>;
}

/**
 * Start listening. `url` resolves once the port is bound and rejects if
 * binding fails.
 */
export function startWebhookServer(
  sink: WebhookEventSink,
  config: Partial<GatewayConfig> = {}
): WebhookServer {
  const { app, config: fullConfig } = createApp(sink, config);

  let onListening: (url: string) => void = () => {};
  let onFailed: (error: Error) => void = () => {};
  const url = new Promise<string>((resolve, reject) => {
    onListening = resolve;
    onFailed = reject;
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: fullConfig.port,
      hostname: fullConfig.host,
    },
    (info) => {
      const base = `http://${info.address}:${info.port}`;
      log.info(`Webhook receiver running at ${base}/${fullConfig.webhookPath}`);
      log.info(`Health: ${base}/health`);
      if (!fullConfig.verifyToken) {
        log.warn('No verify token configured; webhook challenges will be rejected');
      }
      onListening(`${base}/${fullConfig.webhookPath}`);
    }
  );

  server.on('error', (error: Error) => {
    log.error('Webhook receiver failed', { error: error.message });
    onFailed(error);
  });

  return {
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          log.info('Webhook receiver stopped');
          resolve();
        });
      }),
  };
}

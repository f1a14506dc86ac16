/**
 * Webhook command - runs the HTTP receiver for KOOK webhook deliveries
 */

import { type EventData, SYSTEM_EVENT_TYPE } from '@kookgate/core';
import { startWebhookServer, type GatewayConfig, type WebhookEventSink } from '@kookgate/gateway';
import { onShutdown, parsePort, resolveConfig } from './shared.js';

export interface WebhookOptions {
  port?: string;
  host?: string;
  path?: string;
  verifyToken?: string;
  /** false when --no-decompress is given */
  decompress?: boolean;
}

/**
 * Sink that prints each delivered event
 */
export function createPrintingSink(): WebhookEventSink {
  return {
    onEvent(data: EventData, sequence: number) {
      const kind = data.type === SYSTEM_EVENT_TYPE ? 'system' : `type ${data.type}`;
      console.log(`📨 #${sequence} ${kind} [${data.target_id}] ${data.author_id}: ${data.content}`);
    },
  };
}

export async function startWebhook(options: WebhookOptions): Promise<void> {
  const config = resolveConfig();
  if (!config) return;

  const overrides: Partial<GatewayConfig> = {};
  if (options.port !== undefined) {
    const port = parsePort(options.port);
    if (port === null) {
      console.error(`❌ Invalid port: ${options.port}`);
      process.exit(1);
      return;
    }
    overrides.port = port;
  }
  if (options.host) overrides.host = options.host;
  if (options.path) overrides.webhookPath = options.path.replace(/^\/+|\/+$/g, '');
  if (options.verifyToken) overrides.verifyToken = options.verifyToken;
  if (options.decompress === false) overrides.decompress = false;

  const settings: GatewayConfig = { ...config.webhook, ...overrides };

  console.log('\n🚀 Starting KOOK webhook receiver...\n');
  console.log(`   Host:         ${settings.host}`);
  console.log(`   Port:         ${settings.port}`);
  console.log(`   Path:         /${settings.webhookPath}`);
  console.log(`   Verify token: ${settings.verifyToken ? 'set' : 'missing'}`);
  console.log(`   Decompress:   ${settings.decompress ? 'on' : 'off'}`);
  console.log('');

  const server = startWebhookServer(createPrintingSink(), settings);

  let url: string;
  try {
    url = await server.url;
  } catch (err) {
    console.error('❌ Could not start the webhook receiver:', err instanceof Error ? err.message : err);
    process.exit(1);
    return;
  }

  console.log(`✅ Listening at ${url}`);
  console.log('Press Ctrl+C to stop');

  await new Promise<void>((resolve, reject) => {
    onShutdown(() => server.close().then(resolve, reject));
  });
}

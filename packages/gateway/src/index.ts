/**
 * @kookgate/gateway
 *
 * HTTP side of the KOOK integration: the webhook receiver with challenge
 * verification and sn de-duplication, served by Hono.
 *
 * @packageDocumentation
 */

export { createApp, type GatewayApp } from './app.js';
export { startWebhookServer, type WebhookServer } from './server.js';
export * from './types/index.js';
export * from './webhook/index.js';
export * from './routes/index.js';
export * from './middleware/index.js';
export * from './config/defaults.js';
export {
  loadConfig,
  loadEnvFile,
  ConfigError,
  type AppConfig,
  type KookSettings,
  type LogSettings,
} from './config/env.js';
export { LogService, createLogService, type LogServiceOptions } from './services/log-service-impl.js';

/**
 * CLI Commands
 */

export { startConnect, type ConnectOptions } from './connect.js';
export { startWebhook, createPrintingSink, type WebhookOptions } from './webhook.js';
export { sendMessage, type SendOptions } from './send.js';
export { resolveConfig, parseIdList, parsePort, onShutdown } from './shared.js';

export { KookBot, createKookBot, type KookBotDependencies, type KookSessionOptions } from './bot.js';
export {
  KookApiClient,
  KookApiError,
  createKookApiClient,
  DEFAULT_API_BASE_URL,
  API_TIMEOUT_MS,
  type KookApi,
  type KookApiClientOptions,
  type BotUser,
  type SendMessageOptions,
  type SentMessage,
} from './api.js';
export { WebSocketTransport, openWebSocketTransport } from './transport.js';

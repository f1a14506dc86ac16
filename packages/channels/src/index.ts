/**
 * @kookgate/channels
 *
 * KOOK bindings for the gateway session: REST directory, WebSocket
 * transport and the bot channel handler
 *
 * @packageDocumentation
 */

// Types
export type {
  ChannelConfig,
  KookConfig,
  IncomingMessage,
  OutgoingMessage,
  ChannelHandler,
  ChannelEvent,
} from './types/index.js';

// KOOK
export * from './kook/index.js';

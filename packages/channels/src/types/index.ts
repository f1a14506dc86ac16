/**
 * Channel types for messaging integrations
 */

/**
 * Base channel configuration
 */
export interface ChannelConfig {
  /** Channel type identifier */
  type: string;
  /** Whether the channel is enabled */
  enabled: boolean;
}

/**
 * KOOK-specific configuration
 */
export interface KookConfig extends ChannelConfig {
  type: 'kook';
  /** Bot token from the KOOK developer portal */
  botToken: string;
  /** REST API base URL */
  apiBaseUrl?: string;
  /** Ask the gateway for compressed frames */
  compress?: boolean;
  /** Allowed channel IDs (empty = allow all) */
  allowedChannelIds?: string[];
  /** Allowed user IDs (empty = allow all) */
  allowedUserIds?: string[];
  /** Message type for replies: 1 text, 9 KMarkdown */
  messageType?: number;
}

/**
 * Incoming message from any channel
 */
export interface IncomingMessage {
  /** Unique message ID */
  id: string;
  /** Channel type */
  channel: string;
  /** Sender user ID */
  userId: string;
  /** Sender username (if available) */
  username?: string;
  /** Chat/conversation ID */
  chatId: string;
  /** Message text content */
  text: string;
  /** Timestamp */
  timestamp: Date;
  /** Original raw message data */
  raw: unknown;
}

/**
 * Outgoing message to any channel
 */
export interface OutgoingMessage {
  /** Chat/conversation ID to send to */
  chatId: string;
  /** Message text content */
  text: string;
  /** Reply to a specific message ID */
  replyToMessageId?: string;
}

/**
 * Channel handler interface
 */
export interface ChannelHandler {
  /** Channel type identifier */
  readonly type: string;
  /** Whether the channel is ready */
  isReady(): boolean;
  /** Start the channel */
  start(): Promise<void>;
  /** Stop the channel */
  stop(): Promise<void>;
  /** Send a message */
  sendMessage(message: OutgoingMessage): Promise<void>;
  /** Set message handler */
  onMessage(handler: (message: IncomingMessage) => Promise<void>): void;
}

/**
 * Channel events
 */
export type ChannelEvent =
  | { type: 'message'; message: IncomingMessage }
  | { type: 'error'; error: Error }
  | { type: 'connected'; sessionId: string | null }
  | { type: 'disconnected' };

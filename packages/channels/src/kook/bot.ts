/**
 * KOOK bot integration over the event gateway
 */

import {
  GatewaySession,
  SYSTEM_EVENT_TYPE,
  getErrorMessage,
  isObject,
  isString,
  type DeliverySink,
  type EventData,
  type GatewaySessionOptions,
  type TransportFactory,
} from '@kookgate/core';
import type {
  KookConfig,
  IncomingMessage,
  OutgoingMessage,
  ChannelHandler,
  ChannelEvent,
} from '../types/index.js';
import { KookApiClient, type KookApi } from './api.js';
import { openWebSocketTransport } from './transport.js';
import { getLog } from '../log.js';

const log = getLog('KookBot');

/**
 * Default configuration
 */
const DEFAULT_CONFIG = {
  compress: true,
  messageType: 1,
} satisfies Partial<KookConfig>;

/** Channel type of messages posted in a server channel */
const GROUP_CHANNEL = 'GROUP';

/** Session tuning passed through to the gateway session */
export type KookSessionOptions = Omit<
  GatewaySessionOptions,
  'directory' | 'openTransport' | 'sink' | 'compress'
>;

export interface KookBotDependencies {
  api?: KookApi;
  openTransport?: TransportFactory;
  session?: KookSessionOptions;
}

/**
 * KOOK bot handler
 */
export class KookBot implements ChannelHandler {
  readonly type = 'kook';
  private readonly config: KookConfig;
  private readonly api: KookApi;
  private readonly openTransport: TransportFactory;
  private readonly sessionOptions: KookSessionOptions;
  private messageHandler?: (message: IncomingMessage) => Promise<void>;
  private readonly listeners = new Set<(event: ChannelEvent) => void>();
  private session: GatewaySession | null = null;
  private connection: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private botUserId: string | null = null;

  constructor(config: KookConfig, deps: KookBotDependencies = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.api =
      deps.api ?? new KookApiClient({ token: config.botToken, baseUrl: config.apiBaseUrl });
    this.openTransport = deps.openTransport ?? openWebSocketTransport;
    this.sessionOptions = deps.session ?? {};
  }

  /**
   * Check if bot is ready
   */
  isReady(): boolean {
    return Boolean(this.config.botToken) && this.config.enabled;
  }

  get isRunning(): boolean {
    return this.connection !== null;
  }

  /** The running gateway session, for status reporting */
  get gatewaySession(): GatewaySession | null {
    return this.session;
  }

  /**
   * Start the bot. Resolves once the gateway session is running; the
   * handshake and everything after it happen in the background.
   */
  async start(): Promise<void> {
    if (this.connection) {
      return;
    }
    // Overlapping calls share one launch so only one session is created
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    await this.starting;
  }

  private async launch(): Promise<void> {
    if (!this.isReady()) {
      throw new Error('KOOK bot is not properly configured');
    }

    const me = await this.api.getMe();
    this.botUserId = me.id;
    log.info(`Starting KOOK bot: ${me.username || me.id}`);

    const session = new GatewaySession({
      ...this.sessionOptions,
      directory: this.api,
      openTransport: this.openTransport,
      sink: this.createSink(),
      compress: this.config.compress,
    });
    this.session = session;

    this.connection = session.connect().then(
      () => {
        log.info('KOOK bot stopped');
      },
      (error: unknown) => {
        log.error('KOOK gateway session ended', { error: getErrorMessage(error) });
        this.emit({
          type: 'error',
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    ).finally(() => {
      this.connection = null;
      this.session = null;
    });
  }

  /**
   * Stop the bot and wait for the session to unwind
   */
  async stop(): Promise<void> {
    if (this.starting) {
      await this.starting.catch((error: unknown) => {
        log.debug('Stop requested after a failed start', { error: getErrorMessage(error) });
      });
    }
    const connection = this.connection;
    if (!connection) {
      return;
    }
    this.session?.close();
    await connection;
  }

  /**
   * Resolves when the session ends on its own or through stop()
   */
  async waitUntilStopped(): Promise<void> {
    await this.connection;
  }

  /**
   * Send a message to a channel
   */
  async sendMessage(message: OutgoingMessage): Promise<void> {
    if (!message.chatId) {
      throw new Error('Invalid chatId: empty');
    }
    await this.api.sendMessage(message.chatId, message.text, {
      type: this.config.messageType,
      quote: message.replyToMessageId,
    });
  }

  /**
   * Set message handler
   */
  onMessage(handler: (message: IncomingMessage) => Promise<void>): void {
    this.messageHandler = handler;
  }

  /**
   * Subscribe to connection and message events. Returns an unsubscribe.
   */
  onChannelEvent(listener: (event: ChannelEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ==========================================================================
  // Gateway delivery
  // ==========================================================================

  private createSink(): DeliverySink {
    return {
      onHello: (data) => {
        log.info('KOOK gateway connected', { sessionId: data.session_id });
        this.emit({ type: 'connected', sessionId: data.session_id ?? null });
      },
      onEvent: (data) => this.handleEvent(data),
      onReconnect: (code, reason) => {
        log.warn('KOOK gateway asked for a reconnect', { code, reason });
        this.emit({ type: 'disconnected' });
      },
      onResume: (sessionId) => {
        log.info('KOOK gateway session resumed', { sessionId });
        this.emit({ type: 'connected', sessionId });
      },
    };
  }

  private async handleEvent(data: EventData): Promise<void> {
    if (data.type === SYSTEM_EVENT_TYPE) {
      log.debug('System event', { msgId: data.msg_id });
      return;
    }
    if (data.channel_type !== GROUP_CHANNEL) {
      log.debug('Ignoring non-channel message', { channelType: data.channel_type });
      return;
    }
    if (data.author_id === this.botUserId) {
      return;
    }
    if (!this.isAllowed(data)) {
      return;
    }

    const incoming = this.parseIncomingMessage(data);
    this.emit({ type: 'message', message: incoming });

    if (!this.messageHandler) {
      return;
    }
    try {
      await this.messageHandler(incoming);
    } catch (err) {
      log.error('Error handling KOOK message', {
        error: getErrorMessage(err),
        msgId: incoming.id,
      });
    }
  }

  /**
   * Check the channel and user whitelists
   */
  private isAllowed(data: EventData): boolean {
    const { allowedUserIds, allowedChannelIds } = this.config;

    if (allowedUserIds && allowedUserIds.length > 0 && !allowedUserIds.includes(data.author_id)) {
      return false;
    }
    if (
      allowedChannelIds &&
      allowedChannelIds.length > 0 &&
      !allowedChannelIds.includes(data.target_id)
    ) {
      return false;
    }
    return true;
  }

  /**
   * Parse an incoming KOOK event to the common format
   */
  private parseIncomingMessage(data: EventData): IncomingMessage {
    const author = isObject(data.extra.author) ? data.extra.author : {};
    return {
      id: data.msg_id,
      channel: 'kook',
      userId: data.author_id,
      username: isString(author.username) ? author.username : undefined,
      chatId: data.target_id,
      text: data.content,
      timestamp: new Date(data.msg_timestamp),
      raw: data,
    };
  }

  private emit(event: ChannelEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error('Channel event listener failed', { error: getErrorMessage(err) });
      }
    }
  }
}

/**
 * Create a KOOK bot instance
 */
export function createKookBot(config: KookConfig, deps?: KookBotDependencies): KookBot {
  return new KookBot(config, deps);
}

/**
 * KOOK REST client
 *
 * Covers the two endpoints the bot needs: gateway resolution and message
 * creation, plus the bot's own identity. Every response is wrapped in the
 * envelope `{ code, message, data }` where code 0 means success.
 */

import {
  AppError,
  AuthenticationError,
  TransportError,
  getErrorMessage,
  isInteger,
  isNonEmptyString,
  isNumber,
  isObject,
  isString,
  type DirectoryService,
  type GatewayEndpoint,
} from '@kookgate/core';
import { getLog } from '../log.js';

const log = getLog('KookApi');

export const DEFAULT_API_BASE_URL = 'https://www.kookapp.cn/api';
export const API_TIMEOUT_MS = 10_000;

/** Envelope codes reserved for token failures */
const AUTH_CODE_MIN = 40100;
const AUTH_CODE_MAX = 40199;

/**
 * The API answered with a non-zero envelope code or an unusable body
 */
export class KookApiError extends AppError {
  readonly code = 'KOOK_API_ERROR' as const;
  readonly statusCode = 502;
  readonly apiCode?: number;
  readonly httpStatus?: number;

  constructor(message: string, options?: { apiCode?: number; httpStatus?: number; cause?: unknown }) {
    super(message, options);
    this.apiCode = options?.apiCode;
    this.httpStatus = options?.httpStatus;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      apiCode: this.apiCode,
      httpStatus: this.httpStatus,
    };
  }
}

export interface KookApiClientOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface BotUser {
  id: string;
  username: string;
}

export interface SendMessageOptions {
  /** 1 text, 9 KMarkdown, 10 card */
  type?: number;
  /** Message ID to quote */
  quote?: string;
  nonce?: string;
}

export interface SentMessage {
  msgId: string;
  msgTimestamp: number;
  nonce: string;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  signal?: AbortSignal;
}

export class KookApiClient implements DirectoryService {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: KookApiClientOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? API_TIMEOUT_MS;
  }

  /**
   * WebSocket URL for a new gateway connection
   */
  async getGateway(compress: boolean, signal?: AbortSignal): Promise<string> {
    return this.request(
      'GET',
      '/v3/gateway/index',
      { query: { compress: compress ? '1' : '0' }, signal },
      (data) => (isObject(data) && isNonEmptyString(data.url) ? data.url : null)
    );
  }

  async resolveEndpoint(compress: boolean, signal?: AbortSignal): Promise<GatewayEndpoint> {
    const url = await this.getGateway(compress, signal);
    log.debug('Gateway resolved', { compress });
    return { url, token: this.token };
  }

  /**
   * The bot's own account, used to ignore its own messages
   */
  async getMe(signal?: AbortSignal): Promise<BotUser> {
    return this.request('GET', '/v3/user/me', { signal }, (data) =>
      isObject(data) && isNonEmptyString(data.id)
        ? { id: data.id, username: isString(data.username) ? data.username : '' }
        : null
    );
  }

  async sendMessage(
    targetId: string,
    content: string,
    options: SendMessageOptions = {}
  ): Promise<SentMessage> {
    const body: Record<string, unknown> = { target_id: targetId, content };
    if (options.type !== undefined) body.type = options.type;
    if (options.quote) body.quote = options.quote;
    if (options.nonce) body.nonce = options.nonce;

    return this.request('POST', '/v3/message/create', { body }, (data) =>
      isObject(data) && isString(data.msg_id)
        ? {
            msgId: data.msg_id,
            msgTimestamp: isNumber(data.msg_timestamp) ? data.msg_timestamp : 0,
            nonce: isString(data.nonce) ? data.nonce : '',
          }
        : null
    );
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    options: RequestOptions,
    parse: (data: unknown) => T | null
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { Authorization: `Bot ${this.token}` };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
    } catch (error) {
      throw new TransportError(`KOOK API request to ${path} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(`KOOK API rejected the bot token (HTTP ${response.status})`);
    }

    let envelope: unknown;
    try {
      envelope = await response.json();
    } catch (error) {
      throw new KookApiError(`Unreadable response from ${path} (HTTP ${response.status})`, {
        httpStatus: response.status,
        cause: error,
      });
    }

    if (!isObject(envelope) || !isInteger(envelope.code)) {
      throw new KookApiError(`Malformed response envelope from ${path}`, {
        httpStatus: response.status,
      });
    }

    const message = isString(envelope.message) ? envelope.message : 'Unknown error';
    if (envelope.code >= AUTH_CODE_MIN && envelope.code <= AUTH_CODE_MAX) {
      throw new AuthenticationError(`KOOK API rejected the bot token: ${message}`);
    }
    if (envelope.code !== 0) {
      throw new KookApiError(`KOOK API error ${envelope.code} on ${path}: ${message}`, {
        apiCode: envelope.code,
        httpStatus: response.status,
      });
    }

    const data = parse(envelope.data);
    if (data === null) {
      throw new KookApiError(`Unexpected response data from ${path}`, {
        httpStatus: response.status,
      });
    }
    return data;
  }
}

/**
 * The part of the client the bot depends on
 */
export type KookApi = DirectoryService & Pick<KookApiClient, 'getMe' | 'sendMessage'>;

/**
 * Create a KOOK REST client
 */
export function createKookApiClient(options: KookApiClientOptions): KookApiClient {
  return new KookApiClient(options);
}

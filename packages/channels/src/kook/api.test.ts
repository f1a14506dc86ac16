import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// ---------------------------------------------------------------------------
// Hoisted mocks
// ---------------------------------------------------------------------------

const { mockLog } = vi.hoisted(() => ({
  mockLog: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

vi.mock('../log.js', () => ({
  getLog: vi.fn(() => mockLog),
}));

import { AuthenticationError, TransportError } from '@kookgate/core';
import { KookApiClient, KookApiError } from './api.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function envelope(data: unknown, code = 0, message = '') {
  return jsonResponse({ code, message, data });
}

function lastCall() {
  const call = mockFetch.mock.calls.at(-1);
  if (!call) throw new Error('fetch was not called');
  const [url, init] = call;
  return { url: String(url), init };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('KookApiClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // =========================================================================
  // Gateway
  // =========================================================================

  describe('getGateway', () => {
    it('requests the gateway index with the bot token', async () => {
      mockFetch.mockResolvedValueOnce(envelope({ url: 'wss://gateway.test/gateway?token=abc' }));
      const client = new KookApiClient({ token: 'test-token' });

      const url = await client.getGateway(true);

      expect(url).toBe('wss://gateway.test/gateway?token=abc');
      const call = lastCall();
      expect(call.url).toBe('https://www.kookapp.cn/api/v3/gateway/index?compress=1');
      expect(call.init?.method).toBe('GET');
      expect(call.init?.headers).toEqual({ Authorization: 'Bot test-token' });
    });

    it('asks for uncompressed frames when compression is off', async () => {
      mockFetch.mockResolvedValueOnce(envelope({ url: 'wss://gateway.test/gateway' }));
      const client = new KookApiClient({ token: 'test-token', baseUrl: 'http://api.test/' });

      await client.getGateway(false);

      expect(lastCall().url).toBe('http://api.test/v3/gateway/index?compress=0');
    });

    it('resolveEndpoint() returns the URL together with the token', async () => {
      mockFetch.mockResolvedValueOnce(envelope({ url: 'wss://gateway.test/gateway' }));
      const client = new KookApiClient({ token: 'test-token' });

      await expect(client.resolveEndpoint(true)).resolves.toEqual({
        url: 'wss://gateway.test/gateway',
        token: 'test-token',
      });
    });
  });

  // =========================================================================
  // Error classification
  // =========================================================================

  describe('errors', () => {
    it('treats HTTP 401 as an authentication failure', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ code: 401, message: 'no' }, 401));
      const client = new KookApiClient({ token: 'test-token' });

      await expect(client.getGateway(true)).rejects.toThrow(
        new AuthenticationError('KOOK API rejected the bot token (HTTP 401)')
      );
    });

    it('treats envelope codes 40100-40199 as authentication failures', async () => {
      mockFetch.mockResolvedValueOnce(envelope(null, 40101, 'invalid token'));
      const client = new KookApiClient({ token: 'test-token' });

      const error = await client.getGateway(true).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toHaveProperty('message', 'KOOK API rejected the bot token: invalid token');
    });

    it('raises KookApiError for other envelope codes', async () => {
      mockFetch.mockResolvedValueOnce(envelope(null, 40000, 'bad request'));
      const client = new KookApiClient({ token: 'test-token' });

      const error = await client.getGateway(true).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(KookApiError);
      if (error instanceof KookApiError) {
        expect(error.apiCode).toBe(40000);
        expect(error.httpStatus).toBe(200);
        expect(error.message).toBe('KOOK API error 40000 on /v3/gateway/index: bad request');
      }
    });

    it('wraps network failures as TransportError', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
      const client = new KookApiClient({ token: 'test-token' });

      const error = await client.getGateway(true).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty(
        'message',
        'KOOK API request to /v3/gateway/index failed: fetch failed'
      );
    });

    it('rejects a body that is not JSON', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>', { status: 502 }));
      const client = new KookApiClient({ token: 'test-token' });

      await expect(client.getGateway(true)).rejects.toThrow(
        'Unreadable response from /v3/gateway/index (HTTP 502)'
      );
    });

    it('rejects a response without the expected data', async () => {
      mockFetch.mockResolvedValueOnce(envelope({}));
      const client = new KookApiClient({ token: 'test-token' });

      await expect(client.getGateway(true)).rejects.toThrow(
        'Unexpected response data from /v3/gateway/index'
      );
    });

    it('rejects an envelope without a code', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ data: {} }));
      const client = new KookApiClient({ token: 'test-token' });

      await expect(client.getGateway(true)).rejects.toThrow(
        'Malformed response envelope from /v3/gateway/index'
      );
    });
  });

  // =========================================================================
  // Messages and identity
  // =========================================================================

  describe('sendMessage', () => {
    it('posts the message as JSON', async () => {
      mockFetch.mockResolvedValueOnce(
        envelope({ msg_id: 'reply-1', msg_timestamp: 1_700_000_000_000, nonce: 'n-1' })
      );
      const client = new KookApiClient({ token: 'test-token' });

      const sent = await client.sendMessage('channel-1', 'hi there', { type: 9, quote: 'msg-1' });

      expect(sent).toEqual({ msgId: 'reply-1', msgTimestamp: 1_700_000_000_000, nonce: 'n-1' });
      const call = lastCall();
      expect(call.url).toBe('https://www.kookapp.cn/api/v3/message/create');
      expect(call.init?.method).toBe('POST');
      expect(call.init?.headers).toEqual({
        Authorization: 'Bot test-token',
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(String(call.init?.body))).toEqual({
        target_id: 'channel-1',
        content: 'hi there',
        type: 9,
        quote: 'msg-1',
      });
    });

    it('omits optional fields that are not given', async () => {
      mockFetch.mockResolvedValueOnce(envelope({ msg_id: 'reply-2' }));
      const client = new KookApiClient({ token: 'test-token' });

      const sent = await client.sendMessage('channel-1', 'plain');

      expect(sent).toEqual({ msgId: 'reply-2', msgTimestamp: 0, nonce: '' });
      expect(JSON.parse(String(lastCall().init?.body))).toEqual({
        target_id: 'channel-1',
        content: 'plain',
      });
    });
  });

  describe('getMe', () => {
    it('returns the bot identity', async () => {
      mockFetch.mockResolvedValueOnce(envelope({ id: 'bot-1', username: 'gatebot', bot: true }));
      const client = new KookApiClient({ token: 'test-token' });

      await expect(client.getMe()).resolves.toEqual({ id: 'bot-1', username: 'gatebot' });
      expect(lastCall().url).toBe('https://www.kookapp.cn/api/v3/user/me');
    });
  });
});

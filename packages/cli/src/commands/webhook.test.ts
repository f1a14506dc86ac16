/**
 * Webhook CLI Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import type { EventData } from '@kookgate/core';

const mocks = vi.hoisted(() => {
  class MockConfigError extends Error {
    constructor(readonly issues: string[]) {
      super(`Invalid configuration: ${issues.join('; ')}`);
    }
  }

  return {
    MockConfigError,
    loadConfig: vi.fn(),
    createLogService: vi.fn(() => ({})),
    setLogService: vi.fn(),
    startWebhookServer: vi.fn(),
    close: vi.fn().mockResolvedValue(undefined),
  };
});

vi.mock('@kookgate/gateway', () => ({
  ConfigError: mocks.MockConfigError,
  loadConfig: mocks.loadConfig,
  createLogService: mocks.createLogService,
  startWebhookServer: mocks.startWebhookServer,
}));

vi.mock('@kookgate/core', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@kookgate/core')>()),
  setLogService: mocks.setLogService,
}));

import { createPrintingSink, startWebhook } from './webhook.js';

const WEBHOOK_SETTINGS = {
  host: '127.0.0.1',
  port: 3000,
  webhookPath: 'webhook',
  verifyToken: 'test-verify-token',
  decompress: true,
  dedupCapacity: 1000,
  bodyLimitBytes: 1024 * 1024,
};

function event(overrides: Partial<EventData> = {}): EventData {
  return {
    channel_type: 'GROUP',
    type: 1,
    target_id: 'channel-1',
    author_id: '1001',
    content: 'hello',
    msg_id: 'msg-1',
    msg_timestamp: 1_700_000_000_000,
    nonce: '',
    extra: {},
    ...overrides,
  };
}

describe('Webhook CLI Command', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.loadConfig.mockReturnValue({
      kook: { compress: true },
      webhook: WEBHOOK_SETTINGS,
      log: { level: 'info' },
    });
    mocks.close.mockResolvedValue(undefined);
    mocks.startWebhookServer.mockImplementation(
      (_sink: unknown, settings: { host: string; port: number; webhookPath: string }) => ({
        url: Promise.resolve(`http://${settings.host}:${settings.port}/${settings.webhookPath}`),
        close: mocks.close,
      })
    );
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('startWebhook', () => {
    it('starts with the configured settings and stops on SIGINT', async () => {
      const done = startWebhook({});

      await vi.waitFor(() => {
        expect(logSpy).toHaveBeenCalledWith('✅ Listening at http://127.0.0.1:3000/webhook');
      });
      expect(mocks.startWebhookServer).toHaveBeenCalledWith(
        expect.objectContaining({ onEvent: expect.any(Function) }),
        WEBHOOK_SETTINGS
      );

      process.emit('SIGINT');
      await done;

      expect(mocks.close).toHaveBeenCalledTimes(1);
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('applies flag overrides', async () => {
      const done = startWebhook({
        port: '8081',
        host: '0.0.0.0',
        path: '/kook/events/',
        verifyToken: 'flag-verify-token',
        decompress: false,
      });

      await vi.waitFor(() => {
        expect(logSpy).toHaveBeenCalledWith('✅ Listening at http://0.0.0.0:8081/kook/events');
      });
      expect(mocks.startWebhookServer).toHaveBeenCalledWith(expect.anything(), {
        ...WEBHOOK_SETTINGS,
        host: '0.0.0.0',
        port: 8081,
        webhookPath: 'kook/events',
        verifyToken: 'flag-verify-token',
        decompress: false,
      });

      process.emit('SIGTERM');
      await done;
    });

    it('exits on an invalid port', async () => {
      await startWebhook({ port: '70000' });

      expect(errorSpy).toHaveBeenCalledWith('❌ Invalid port: 70000');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(mocks.startWebhookServer).not.toHaveBeenCalled();
    });

    it('exits when the port cannot be bound', async () => {
      mocks.startWebhookServer.mockReturnValue({
        url: Promise.reject(new Error('listen EADDRINUSE')),
        close: mocks.close,
      });

      await startWebhook({});

      expect(errorSpy).toHaveBeenCalledWith(
        '❌ Could not start the webhook receiver:',
        'listen EADDRINUSE'
      );
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });

  describe('createPrintingSink', () => {
    it('prints chat messages with their sequence number', async () => {
      await createPrintingSink().onEvent(event(), 7);

      expect(logSpy).toHaveBeenCalledWith('📨 #7 type 1 [channel-1] 1001: hello');
    });

    it('labels system notifications', async () => {
      await createPrintingSink().onEvent(
        event({ type: 255, author_id: '1', content: '[system]' }),
        8
      );

      expect(logSpy).toHaveBeenCalledWith('📨 #8 system [channel-1] 1: [system]');
    });
  });
});

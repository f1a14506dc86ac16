/**
 * Connect CLI Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

// ============================================================================
// Hoisted mocks
// ============================================================================

const mocks = vi.hoisted(() => {
  class MockConfigError extends Error {
    constructor(readonly issues: string[]) {
      super(`Invalid configuration: ${issues.join('; ')}`);
    }
  }

  const listeners: Array<(event: unknown) => void> = [];
  const messageHandlers: Array<(message: unknown) => Promise<void>> = [];

  const bot = {
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    waitUntilStopped: vi.fn().mockResolvedValue(undefined),
    sendMessage: vi.fn().mockResolvedValue(undefined),
    onMessage: vi.fn(),
    onChannelEvent: vi.fn(),
  };

  return {
    MockConfigError,
    listeners,
    messageHandlers,
    bot,
    createKookBot: vi.fn(() => bot),
    loadConfig: vi.fn(),
    createLogService: vi.fn(() => ({})),
    setLogService: vi.fn(),
  };
});

function baseConfig(botToken?: string) {
  return {
    kook: { botToken, apiBaseUrl: undefined, compress: true },
    webhook: {},
    log: { level: 'info' },
  };
}

// ============================================================================
// Module mocks
// ============================================================================

vi.mock('@kookgate/channels', () => ({
  createKookBot: mocks.createKookBot,
}));

vi.mock('@kookgate/gateway', () => ({
  ConfigError: mocks.MockConfigError,
  loadConfig: mocks.loadConfig,
  createLogService: mocks.createLogService,
}));

vi.mock('@kookgate/core', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@kookgate/core')>()),
  setLogService: mocks.setLogService,
}));

// ============================================================================
// Import after mocks
// ============================================================================

import { startConnect } from './connect.js';

describe('Connect CLI Command', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.listeners.length = 0;
    mocks.messageHandlers.length = 0;
    mocks.bot.onChannelEvent.mockImplementation((listener: (event: unknown) => void) => {
      mocks.listeners.push(listener);
      return () => {};
    });
    mocks.bot.onMessage.mockImplementation((handler: (message: unknown) => Promise<void>) => {
      mocks.messageHandlers.push(handler);
    });
    mocks.bot.start.mockResolvedValue(undefined);
    mocks.bot.waitUntilStopped.mockResolvedValue(undefined);
    mocks.loadConfig.mockReturnValue(baseConfig('test-token'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function emit(event: unknown): void {
    for (const listener of mocks.listeners) listener(event);
  }

  it('exits when the configuration is invalid', async () => {
    mocks.loadConfig.mockImplementation(() => {
      throw new mocks.MockConfigError(['WEBHOOK_PORT: Number must be less than or equal to 65535']);
    });

    await startConnect({});

    expect(errorSpy).toHaveBeenCalledWith('❌ Invalid configuration:');
    expect(errorSpy).toHaveBeenCalledWith(
      '   WEBHOOK_PORT: Number must be less than or equal to 65535'
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mocks.createKookBot).not.toHaveBeenCalled();
  });

  it('exits when no token is configured', async () => {
    mocks.loadConfig.mockReturnValue(baseConfig());

    await startConnect({});

    expect(errorSpy).toHaveBeenCalledWith('❌ Error: KOOK bot token is required');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mocks.createKookBot).not.toHaveBeenCalled();
  });

  it('installs the configured log service', async () => {
    await startConnect({});

    expect(mocks.createLogService).toHaveBeenCalledWith({ level: 'info' });
    expect(mocks.setLogService).toHaveBeenCalledTimes(1);
  });

  it('builds the bot from the environment and flags', async () => {
    await startConnect({ users: '1001, 1002,', channels: '' });

    expect(mocks.createKookBot).toHaveBeenCalledWith(
      {
        type: 'kook',
        enabled: true,
        botToken: 'test-token',
        apiBaseUrl: undefined,
        compress: true,
        allowedUserIds: ['1001', '1002'],
        allowedChannelIds: undefined,
      },
      { session: { resume: true } }
    );
    expect(mocks.bot.start).toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('lets flags override the token and turn off compression and resume', async () => {
    await startConnect({ token: 'flag-token', compress: false, resume: false });

    expect(mocks.createKookBot).toHaveBeenCalledWith(
      expect.objectContaining({ botToken: 'flag-token', compress: false }),
      { session: { resume: false } }
    );
    expect(logSpy).toHaveBeenCalledWith('   Compression:      off');
    expect(logSpy).toHaveBeenCalledWith('   Resume:           off');
  });

  it('prints channel events while running', async () => {
    mocks.bot.waitUntilStopped.mockImplementation(async () => {
      emit({ type: 'connected', sessionId: 'session-1' });
      emit({
        type: 'message',
        message: { chatId: 'channel-1', userId: '1001', username: 'alice', text: 'hello' },
      });
      emit({ type: 'disconnected' });
    });

    await startConnect({});

    expect(logSpy).toHaveBeenCalledWith('✅ Connected to the gateway (session session-1)');
    expect(logSpy).toHaveBeenCalledWith('📨 [channel-1] alice: hello');
    expect(logSpy).toHaveBeenCalledWith('⚠️  Gateway requested a reconnect');
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('exits with failure when the session ends with an error', async () => {
    mocks.bot.waitUntilStopped.mockImplementation(async () => {
      emit({ type: 'error', error: new Error('Reconnect attempts exhausted') });
    });

    await startConnect({});

    expect(errorSpy).toHaveBeenCalledWith('❌ Reconnect attempts exhausted');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('exits when the bot fails to start', async () => {
    mocks.bot.start.mockRejectedValue(new Error('unauthorized'));

    await startConnect({});

    expect(errorSpy).toHaveBeenCalledWith('❌ Failed to start: unauthorized');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mocks.bot.waitUntilStopped).not.toHaveBeenCalled();
  });

  it('does not register a message handler without --ping-pong', async () => {
    await startConnect({});

    expect(mocks.bot.onMessage).not.toHaveBeenCalled();
  });

  it('answers ping with pong when --ping-pong is set', async () => {
    await startConnect({ pingPong: true });

    expect(mocks.messageHandlers).toHaveLength(1);
    const [handler] = mocks.messageHandlers;
    await handler?.({ id: 'msg-1', chatId: 'channel-1', text: ' Ping ' });
    await handler?.({ id: 'msg-2', chatId: 'channel-1', text: 'hello' });

    expect(mocks.bot.sendMessage).toHaveBeenCalledTimes(1);
    expect(mocks.bot.sendMessage).toHaveBeenCalledWith({
      chatId: 'channel-1',
      text: 'pong',
      replyToMessageId: 'msg-1',
    });
  });
});

/**
 * Shared test helpers for @kookgate/core
 *
 * In-process stand-ins for the session's collaborators. Nothing here
 * opens a socket or reads a real clock.
 *
 * IMPORTANT: Because vi.mock() is hoisted to the top of each test file,
 * createMockLog() is used INSIDE vi.mock factories, not as a replacement
 * for the vi.mock call itself.
 */

import { vi } from 'vitest';
import type { ILogService } from './logging/log-service.js';
import type { RawFrame } from './protocol/codec.js';
import type { EventData, HelloData } from './protocol/signal.js';
import type {
  DeliverySink,
  DirectoryService,
  GatewayEndpoint,
  ReceiveResult,
  Transport,
  TransportFactory,
} from './session/types.js';
import { TransportError } from './types/errors.js';

// ---------------------------------------------------------------------------
// 1. Mock logger
// ---------------------------------------------------------------------------

/**
 * Create a mock ILogService. `child()` returns a new mock log.
 *
 *   vi.mock('../logging/get-log.js', () => ({
 *     getLog: () => createMockLog(),
 *   }));
 */
export function createMockLog(): ILogService {
  const log: ILogService = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => createMockLog()),
  };
  return log;
}

// ---------------------------------------------------------------------------
// 2. Frames
// ---------------------------------------------------------------------------

export function eventPayload(overrides: Partial<EventData> = {}): EventData {
  return {
    channel_type: 'GROUP',
    type: 1,
    target_id: 'channel-1',
    author_id: 'user-1',
    content: 'hello',
    msg_id: 'msg-1',
    msg_timestamp: 1_700_000_000_000,
    nonce: '',
    extra: {},
    ...overrides,
  };
}

export const frames = {
  hello(sessionId: string, code = 0): string {
    return JSON.stringify({ s: 1, d: { code, session_id: sessionId } });
  },
  event(sn: number, payload: unknown = eventPayload({ msg_id: `msg-${sn}` })): string {
    return JSON.stringify({ s: 0, sn, d: payload });
  },
  pong(): string {
    return JSON.stringify({ s: 3 });
  },
  reconnect(code: number, reason: string): string {
    return JSON.stringify({ s: 5, d: { code, err: reason } });
  },
  resumeAck(sessionId: string): string {
    return JSON.stringify({ s: 6, d: { session_id: sessionId } });
  },
};

// ---------------------------------------------------------------------------
// 3. Fake transport
// ---------------------------------------------------------------------------

/**
 * One scripted receive outcome. `timeout` advances the fake clock by the
 * timeout the session asked for.
 */
export type ScriptStep =
  | { type: 'frame'; data: RawFrame }
  | { type: 'timeout' }
  | { type: 'closed'; code: number; reason?: string };

export interface FakeTransportOptions {
  /** Advance the fake clock; called for scripted timeouts */
  advance?: (ms: number) => void;
  /** Called when the script is used up and receive() starts to block */
  onDrained?: () => void;
}

/**
 * Transport that replays a script. When the script runs out, receive()
 * blocks until close() is called.
 */
export class FakeTransport implements Transport {
  readonly sent: string[] = [];
  readonly receiveTimeouts: number[] = [];
  closedWith: { code: number; reason: string } | null = null;
  private readonly script: ScriptStep[];
  private waiter: ((result: ReceiveResult) => void) | null = null;

  constructor(
    script: Array<ScriptStep | string>,
    private readonly options: FakeTransportOptions = {}
  ) {
    this.script = script.map((step): ScriptStep =>
      typeof step === 'string' ? { type: 'frame', data: step } : step
    );
  }

  async send(data: string): Promise<void> {
    if (this.closedWith) {
      throw new TransportError('send on closed transport');
    }
    this.sent.push(data);
  }

  receive(timeoutMs: number): Promise<ReceiveResult> {
    this.receiveTimeouts.push(timeoutMs);
    if (this.closedWith) {
      return Promise.resolve({ type: 'closed', ...this.closedWith });
    }

    const step = this.script.shift();
    if (step) {
      switch (step.type) {
        case 'frame':
          return Promise.resolve({ type: 'frame', data: step.data });
        case 'timeout':
          this.options.advance?.(timeoutMs);
          return Promise.resolve({ type: 'timeout' });
        case 'closed':
          this.closedWith = { code: step.code, reason: step.reason ?? '' };
          return Promise.resolve({ type: 'closed', ...this.closedWith });
      }
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
      this.options.onDrained?.();
    });
  }

  async close(code = 1000, reason = ''): Promise<void> {
    if (this.closedWith) return;
    this.closedWith = { code, reason };
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ type: 'closed', code, reason });
  }
}

/**
 * Factory handing out the given transports in order. The URL of every
 * open is recorded; an entry of type Error rejects that open instead.
 */
export function fakeTransportFactory(
  transports: Array<FakeTransport | Error>
): TransportFactory & { urls: string[] } {
  const queue = [...transports];
  const urls: string[] = [];
  const factory = async (url: string): Promise<Transport> => {
    urls.push(url);
    const next = queue.shift();
    if (!next) {
      throw new TransportError('connection refused');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return Object.assign(factory, { urls });
}

// ---------------------------------------------------------------------------
// 4. Directory and sink
// ---------------------------------------------------------------------------

export const TEST_ENDPOINT: GatewayEndpoint = {
  url: 'wss://gateway.test/gateway',
  token: 'test-token',
};

export function fakeDirectory(endpoint: GatewayEndpoint = TEST_ENDPOINT) {
  return {
    resolveEndpoint: vi.fn<DirectoryService['resolveEndpoint']>(async () => endpoint),
  };
}

/**
 * Sink recording every callback. `sequences` lists delivered sn in order.
 */
export function recordingSink() {
  const sequences: number[] = [];
  const sink = {
    sequences,
    onHello: vi.fn<(data: HelloData) => void>(),
    onEvent: vi.fn((_data: EventData, sequence: number) => {
      sequences.push(sequence);
    }),
    onReconnect: vi.fn<(code: number, reason: string) => void>(),
    onResume: vi.fn<(sessionId: string) => void>(),
  } satisfies DeliverySink & { sequences: number[] };
  return sink;
}

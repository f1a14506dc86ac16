/**
 * Gateway Session
 *
 * Drives one logical connection to the event gateway: endpoint
 * resolution, the Hello handshake, heartbeats, ordered delivery and
 * reconnection. Everything happens on the single control flow started by
 * connect(), so session state is never touched concurrently.
 */

import { CONNECT_TIMEOUT_MS, HELLO_TIMEOUT_MS } from '../config/defaults.js';
import { getLog } from '../logging/get-log.js';
import { decodeFrame, encodeHeartbeat, parseEventData } from '../protocol/codec.js';
import { HELLO_OK, type EventSignal, type Signal } from '../protocol/signal.js';
import {
  type AppError,
  AuthenticationError,
  ExhaustedError,
  ProtocolError,
  TransportError,
  getErrorMessage,
  toAppError,
} from '../types/errors.js';
import { delay } from './delay.js';
import { HeartbeatMonitor, type HeartbeatOptions } from './heartbeat-monitor.js';
import { ReconnectPolicy, type ReconnectOptions } from './reconnect-policy.js';
import {
  type SessionState,
  buildConnectUrl,
  createSessionState,
  redactUrl,
} from './session-state.js';
import type {
  DeliverySink,
  DirectoryService,
  SessionStatus,
  Transport,
  TransportFactory,
} from './types.js';

const log = getLog('GatewaySession');

export interface GatewaySessionOptions {
  directory: DirectoryService;
  openTransport: TransportFactory;
  sink: DeliverySink;
  /** Ask the gateway for compressed frames (default: true) */
  compress?: boolean;
  /** Resume the held session after a transport failure (default: true) */
  resume?: boolean;
  helloTimeoutMs?: number;
  connectTimeoutMs?: number;
  heartbeat?: HeartbeatOptions;
  reconnect?: ReconnectOptions;
  bufferCapacity?: number;
  /** Clock, in milliseconds */
  now?: () => number;
  /** Backoff wait; must return early when the signal aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  onStateChange?: (state: SessionStatus, previous: SessionStatus) => void;
}

export class GatewaySession {
  private readonly directory: DirectoryService;
  private readonly openTransport: TransportFactory;
  private readonly sink: DeliverySink;
  private readonly compress: boolean;
  private readonly resume: boolean;
  private readonly helloTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly heartbeat: HeartbeatOptions;
  private readonly reconnect: ReconnectOptions;
  private readonly bufferCapacity: number | undefined;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly onStateChange?: (state: SessionStatus, previous: SessionStatus) => void;

  private status: SessionStatus = 'idle';
  private session: SessionState;
  private policy: ReconnectPolicy;
  private controller: AbortController | null = null;

  constructor(options: GatewaySessionOptions) {
    this.directory = options.directory;
    this.openTransport = options.openTransport;
    this.sink = options.sink;
    this.compress = options.compress ?? true;
    this.resume = options.resume ?? true;
    this.helloTimeoutMs = options.helloTimeoutMs ?? HELLO_TIMEOUT_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this.heartbeat = options.heartbeat ?? {};
    this.reconnect = options.reconnect ?? {};
    this.bufferCapacity = options.bufferCapacity;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
    this.onStateChange = options.onStateChange;

    this.session = this.freshState();
    this.policy = new ReconnectPolicy(this.reconnect);
  }

  get state(): SessionStatus {
    return this.status;
  }

  /** Failed attempts since the last successful handshake */
  get attempt(): number {
    return this.policy.attempt;
  }

  get sessionId(): string | null {
    return this.session.sessionId;
  }

  /** Highest sequence delivered to the sink */
  get cursor(): number {
    return this.session.cursor;
  }

  /** Events held while waiting for a gap to close */
  get bufferedCount(): number {
    return this.session.buffer.size;
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Run the session until it is cancelled (resolves) or gives up
   * (rejects with ExhaustedError or AuthenticationError).
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.controller) {
      throw new Error('Gateway session is already running');
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.session = this.freshState();
    this.policy = new ReconnectPolicy(this.reconnect);

    try {
      await this.run(controller.signal);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
    }
  }

  /** Cancel the running session. connect() resolves once it has unwound. */
  close(): void {
    this.controller?.abort();
  }

  // ==========================================================================
  // Connection loop
  // ==========================================================================

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const failure = await this.attemptConnection(signal);
      if (!failure || signal.aborted) {
        break;
      }

      if (failure instanceof AuthenticationError) {
        log.error('Authentication rejected, giving up', { error: failure.message });
        this.setStatus('terminated');
        throw failure;
      }

      // Without a held session id the next connection starts a new session
      if (
        !this.resume ||
        this.session.sessionId === null ||
        (failure instanceof ProtocolError && failure.resetSession)
      ) {
        this.session = this.freshState(this.session);
      }

      const delayMs = this.policy.nextDelay();
      if (delayMs === null) {
        log.error('Reconnect attempts exhausted', {
          attempts: this.policy.maxAttempts,
          error: failure.message,
        });
        this.setStatus('terminated');
        throw new ExhaustedError(this.policy.maxAttempts, { cause: failure });
      }

      log.warn('Connection lost, reconnecting', {
        attempt: this.policy.attempt,
        delayMs,
        error: failure.message,
      });
      this.setStatus('reconnecting');
      await this.sleep(delayMs, signal);
    }

    this.setStatus('closing');
    this.setStatus('terminated');
  }

  /**
   * One connection attempt, from endpoint resolution until the connection
   * ends. Returns the failure that ended it, or null when cancelled.
   */
  private async attemptConnection(signal: AbortSignal): Promise<AppError | null> {
    this.setStatus('connecting');
    let transport: Transport | null = null;
    const closeOnAbort = () => {
      transport?.close(1000, 'client closing').catch((error: unknown) => {
        log.warn('Transport close failed', { error: getErrorMessage(error) });
      });
    };

    try {
      const endpoint = await this.directory.resolveEndpoint(this.compress, signal);
      if (signal.aborted) return null;
      this.session.endpoint = endpoint;

      const resuming = this.resume && this.session.sessionId !== null;
      const url = buildConnectUrl(endpoint, this.session, resuming);
      log.info('Connecting to gateway', { url: redactUrl(url), resuming });

      transport = await this.openTransport(url, { signal, timeoutMs: this.connectTimeoutMs });
      if (signal.aborted) return null;
      signal.addEventListener('abort', closeOnAbort, { once: true });

      this.setStatus('awaiting_hello');
      await this.awaitHello(transport, resuming);
      this.setStatus('connected');
      this.policy.reset();

      return await this.receiveLoop(transport, signal);
    } catch (error) {
      if (signal.aborted) return null;
      return toAppError(error);
    } finally {
      signal.removeEventListener('abort', closeOnAbort);
      if (transport) {
        await transport.close().catch((error: unknown) => {
          log.warn('Transport close failed', { error: getErrorMessage(error) });
        });
      }
    }
  }

  private async awaitHello(transport: Transport, resuming: boolean): Promise<void> {
    const received = await transport.receive(this.helloTimeoutMs);
    if (received.type === 'timeout') {
      throw new ProtocolError(`No hello within ${this.helloTimeoutMs}ms`);
    }
    if (received.type === 'closed') {
      throw new TransportError(`Connection closed before hello (${received.code})`, {
        closeCode: received.code,
      });
    }

    const decoded = decodeFrame(received.data, this.session.compress);
    if (!decoded.ok) {
      throw new ProtocolError('Undecodable hello frame', { cause: decoded.error });
    }
    const hello = decoded.value;
    if (hello.kind !== 'hello') {
      throw new ProtocolError(`Expected hello, received ${hello.kind}`);
    }
    if (hello.payload.code !== HELLO_OK) {
      throw new ProtocolError(`Handshake rejected with code ${hello.payload.code}`, {
        resetSession: true,
      });
    }

    const sessionId = hello.payload.session_id ?? null;
    if (resuming && sessionId !== this.session.sessionId) {
      log.info('Gateway started a new session', {
        previous: this.session.sessionId,
        sessionId,
      });
      this.session = this.freshState(this.session);
    }
    this.session.sessionId = sessionId;
    log.info('Handshake complete', { sessionId, cursor: this.session.cursor });

    await this.notify('onHello', () => this.sink.onHello(hello.payload));
  }

  private async receiveLoop(transport: Transport, signal: AbortSignal): Promise<AppError | null> {
    const monitor = new HeartbeatMonitor(this.now(), this.heartbeat);

    while (!signal.aborted) {
      const action = monitor.tick(this.now());
      let waitMs: number;

      switch (action.type) {
        case 'timeout':
          return new ProtocolError(
            `No heartbeat acknowledgement within ${monitor.ackTimeoutMs}ms`,
            { resetSession: true }
          );
        case 'send':
          await transport.send(encodeHeartbeat(this.session.cursor));
          monitor.markSent(this.now());
          log.debug('Heartbeat sent', { sn: this.session.cursor });
          waitMs = monitor.ackTimeoutMs;
          break;
        default:
          waitMs = action.remainingMs;
      }

      const received = await transport.receive(waitMs);
      if (signal.aborted) return null;
      if (received.type === 'timeout') continue;
      if (received.type === 'closed') {
        return new TransportError(
          `Connection closed (${received.code}${received.reason ? `: ${received.reason}` : ''})`,
          { closeCode: received.code }
        );
      }

      const decoded = decodeFrame(received.data, this.session.compress);
      if (!decoded.ok) {
        log.warn('Dropping undecodable frame', {
          reason: decoded.error.reason,
          error: decoded.error.message,
        });
        continue;
      }

      const failure = await this.dispatch(decoded.value, monitor, signal);
      if (failure) return failure;
    }
    return null;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private async dispatch(
    signal: Signal,
    monitor: HeartbeatMonitor,
    abort: AbortSignal
  ): Promise<AppError | null> {
    switch (signal.kind) {
      case 'event':
        return this.handleEvent(signal, abort);

      case 'heartbeat_ack':
        monitor.acknowledge();
        log.debug('Heartbeat acknowledged');
        return null;

      case 'reconnect': {
        const { code, reason } = signal.payload;
        log.warn('Gateway requested reconnect', { code, reason });
        await this.notify('onReconnect', () => this.sink.onReconnect(code, reason));
        return new ProtocolError(`Gateway requested reconnect (${code}: ${reason})`, {
          resetSession: true,
        });
      }

      case 'resume_ack': {
        const { sessionId } = signal.payload;
        if (!sessionId) {
          log.warn('Resume acknowledgement without session id');
          return null;
        }
        this.session.sessionId = sessionId;
        log.info('Session resumed', { sessionId, cursor: this.session.cursor });
        await this.notify('onResume', () => this.sink.onResume(sessionId));
        return null;
      }

      case 'hello':
        log.warn('Ignoring hello on an established connection', { code: signal.payload.code });
        return null;

      case 'unknown':
        log.warn('Ignoring unknown signal', { opcode: signal.opcode });
        return null;
    }
  }

  private async handleEvent(event: EventSignal, abort: AbortSignal): Promise<AppError | null> {
    const before = this.session.cursor;
    const { run, overflow } = this.session.buffer.observe(before, event);

    if (overflow) {
      return new ProtocolError(
        `Reorder buffer full (${this.session.buffer.capacity} events) waiting for sn ${before + 1}`,
        { resetSession: true }
      );
    }
    if (run.length === 0) {
      log.debug(event.sequence <= before ? 'Dropping duplicate event' : 'Holding out-of-order event', {
        sn: event.sequence,
        cursor: before,
      });
      return null;
    }

    for (const item of run) {
      if (abort.aborted) break;
      this.session.cursor = item.sequence;

      const data = parseEventData(item.payload);
      if (!data.ok) {
        log.warn('Dropping event with malformed payload', {
          sn: item.sequence,
          error: data.error.message,
        });
        continue;
      }
      await this.notify('onEvent', () => this.sink.onEvent(data.value, item.sequence));
    }
    return null;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async notify(callback: keyof DeliverySink, invoke: () => void | Promise<void>): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      log.error(`Delivery sink ${callback} failed`, { error: getErrorMessage(error) });
    }
  }

  private freshState(previous?: SessionState): SessionState {
    return createSessionState({
      compress: this.compress,
      bufferCapacity: this.bufferCapacity,
      endpoint: previous?.endpoint ?? null,
    });
  }

  private setStatus(next: SessionStatus): void {
    if (next === this.status) return;
    const previous = this.status;
    this.status = next;
    this.onStateChange?.(next, previous);
  }
}

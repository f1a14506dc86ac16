/**
 * Gateway session contracts
 *
 * The session depends on three collaborators: a directory that names the
 * endpoint, a transport that moves frames, and the consumer's sink.
 */

import type { RawFrame } from '../protocol/codec.js';
import type { EventData, HelloData } from '../protocol/signal.js';

// ============================================================================
// Directory service
// ============================================================================

export interface GatewayEndpoint {
  /** WebSocket URL returned by the directory */
  url: string;
  /** Token appended to the URL when the directory did not embed one */
  token?: string;
}

export interface DirectoryService {
  /**
   * Resolve the gateway endpoint. Failures are retried by the session's
   * reconnect policy, except AuthenticationError which is terminal.
   */
  resolveEndpoint(compress: boolean, signal?: AbortSignal): Promise<GatewayEndpoint>;
}

// ============================================================================
// Transport
// ============================================================================

export type ReceiveResult =
  | { type: 'frame'; data: RawFrame }
  | { type: 'timeout' }
  | { type: 'closed'; code: number; reason: string };

/**
 * Duplex frame stream. Owned by one session control flow, so no method is
 * ever called concurrently with another, except close().
 */
export interface Transport {
  send(data: string): Promise<void>;
  /**
   * Next inbound frame, waiting at most timeoutMs. A pending receive must
   * settle with `closed` once close() is called. I/O failures reject with
   * a TransportError.
   */
  receive(timeoutMs: number): Promise<ReceiveResult>;
  close(code?: number, reason?: string): Promise<void>;
}

export interface OpenTransportOptions {
  /** Aborts the handshake */
  signal: AbortSignal;
  /** Upper bound for the transport handshake (ms) */
  timeoutMs: number;
}

export type TransportFactory = (url: string, options: OpenTransportOptions) => Promise<Transport>;

// ============================================================================
// Delivery sink
// ============================================================================

/**
 * Consumer callbacks. They are awaited one at a time on the session's own
 * control flow, so a slow callback delays everything behind it, heartbeats
 * included. Errors thrown here are logged and do not end the session.
 */
export interface DeliverySink {
  onHello(data: HelloData): void | Promise<void>;
  /** Once per event, in strictly increasing sequence order */
  onEvent(data: EventData, sequence: number): void | Promise<void>;
  onReconnect(code: number, reason: string): void | Promise<void>;
  onResume(sessionId: string): void | Promise<void>;
}

// ============================================================================
// Session lifecycle
// ============================================================================

export type SessionStatus =
  | 'idle'
  | 'connecting'
  | 'awaiting_hello'
  | 'connected'
  | 'reconnecting'
  | 'closing'
  | 'terminated';

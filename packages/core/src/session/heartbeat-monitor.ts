/**
 * Heartbeat Monitor
 *
 * Decides when the next ping is due and when a missing pong means the
 * connection is dead. Consulted once per loop iteration with the current
 * time; it never reads a clock itself.
 */

import { HEARTBEAT_INTERVAL_MS, HEARTBEAT_ACK_TIMEOUT_MS } from '../config/defaults.js';

export interface HeartbeatOptions {
  /** Time between pings (ms) */
  intervalMs?: number;
  /** Time allowed for the pong after a ping (ms) */
  ackTimeoutMs?: number;
}

export type HeartbeatAction =
  /** A ping is due; call markSent() once it is written */
  | { type: 'send' }
  /** A ping is outstanding; the pong may still arrive within remainingMs */
  | { type: 'await_ack'; remainingMs: number }
  /** No ping outstanding; the next is due in remainingMs */
  | { type: 'idle'; remainingMs: number }
  /** The pong did not arrive in time */
  | { type: 'timeout' };

export class HeartbeatMonitor {
  readonly intervalMs: number;
  readonly ackTimeoutMs: number;
  private lastSentAt: number;
  private awaitingAck = false;

  /**
   * @param startedAt - when the connection came up; the first ping is due
   *   one interval later
   */
  constructor(startedAt: number, options: HeartbeatOptions = {}) {
    this.intervalMs = options.intervalMs ?? HEARTBEAT_INTERVAL_MS;
    this.ackTimeoutMs = options.ackTimeoutMs ?? HEARTBEAT_ACK_TIMEOUT_MS;
    this.lastSentAt = startedAt;
  }

  get isAwaitingAck(): boolean {
    return this.awaitingAck;
  }

  tick(now: number): HeartbeatAction {
    const elapsed = now - this.lastSentAt;

    if (this.awaitingAck) {
      if (elapsed >= this.ackTimeoutMs) {
        // Reported once; the caller tears the connection down
        this.awaitingAck = false;
        return { type: 'timeout' };
      }
      return { type: 'await_ack', remainingMs: this.ackTimeoutMs - elapsed };
    }

    if (elapsed >= this.intervalMs) {
      return { type: 'send' };
    }
    return { type: 'idle', remainingMs: this.intervalMs - elapsed };
  }

  markSent(now: number): void {
    this.lastSentAt = now;
    this.awaitingAck = true;
  }

  /** Pong received. A stray pong with nothing outstanding is harmless. */
  acknowledge(): void {
    this.awaitingAck = false;
  }
}

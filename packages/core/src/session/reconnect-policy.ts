/**
 * Reconnect Policy
 *
 * Exponential backoff with a fixed attempt bound. Attempt n waits
 * baseDelayMs * 2^n; once the bound is passed nextDelay() returns null
 * and the caller gives up without waiting.
 */

import { RECONNECT_MAX_ATTEMPTS, RECONNECT_BASE_DELAY_MS } from '../config/defaults.js';

export interface ReconnectOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
}

export class ReconnectPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  private attemptCount = 0;

  constructor(options: ReconnectOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? RECONNECT_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? RECONNECT_BASE_DELAY_MS;
  }

  /** Failures since the last successful handshake */
  get attempt(): number {
    return this.attemptCount;
  }

  /**
   * Record a failure and return the delay before the next attempt,
   * or null when the attempts are used up.
   */
  nextDelay(): number | null {
    this.attemptCount += 1;
    if (this.attemptCount > this.maxAttempts) {
      return null;
    }
    return this.baseDelayMs * 2 ** this.attemptCount;
  }

  reset(): void {
    this.attemptCount = 0;
  }
}

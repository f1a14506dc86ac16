/**
 * Bounded set of recently seen sequence numbers.
 *
 * Webhook deliveries carry no ordering guarantee, so the window evicts by
 * insertion age rather than by distance from the highest sn.
 */

import { WEBHOOK_DEDUP_CAPACITY } from '../config/defaults.js';

export class SequenceWindow {
  // Set iteration follows insertion order, so the first entry is the oldest
  private readonly seen = new Set<number>();

  constructor(readonly capacity: number = WEBHOOK_DEDUP_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Sequence window capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.seen.size;
  }

  has(sequence: number): boolean {
    return this.seen.has(sequence);
  }

  /**
   * Record a sequence number. Returns false if it was already present.
   */
  add(sequence: number): boolean {
    if (this.seen.has(sequence)) {
      return false;
    }
    this.seen.add(sequence);
    if (this.seen.size > this.capacity) {
      const oldest = this.seen.values().next();
      if (!oldest.done) {
        this.seen.delete(oldest.value);
      }
    }
    return true;
  }

  delete(sequence: number): boolean {
    return this.seen.delete(sequence);
  }

  clear(): void {
    this.seen.clear();
  }
}

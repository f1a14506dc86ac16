/**
 * Sequence Reorder Buffer
 *
 * Holds events that arrived ahead of the cursor and releases them as one
 * contiguous run once the gap closes. The cursor is the highest sequence
 * already delivered, so the next deliverable sequence is cursor + 1.
 * Holds no I/O and no clock.
 */

import { REORDER_BUFFER_CAPACITY } from '../config/defaults.js';

export interface Sequenced {
  readonly sequence: number;
}

export interface ObserveResult<T> {
  /** Items now deliverable, in ascending sequence order */
  run: T[];
  /** Cursor after the run */
  cursor: number;
  /** The item could not be held because the buffer is full */
  overflow: boolean;
}

export class ReorderBuffer<T extends Sequenced> {
  private readonly pending = new Map<number, T>();
  readonly capacity: number;

  constructor(capacity: number = REORDER_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Reorder buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Number of held items */
  get size(): number {
    return this.pending.size;
  }

  /** Held sequence numbers, ascending */
  heldSequences(): number[] {
    return [...this.pending.keys()].sort((a, b) => a - b);
  }

  /**
   * Feed one item against the current cursor.
   *
   * - sequence <= cursor, or already held: duplicate, nothing changes
   * - sequence == cursor + 1: delivered together with every held item
   *   that continues the run
   * - anything further ahead: held until the gap closes
   */
  observe(cursor: number, item: T): ObserveResult<T> {
    const { sequence } = item;

    if (sequence <= cursor || this.pending.has(sequence)) {
      return { run: [], cursor, overflow: false };
    }

    if (sequence > cursor + 1) {
      if (this.pending.size >= this.capacity) {
        return { run: [], cursor, overflow: true };
      }
      this.pending.set(sequence, item);
      return { run: [], cursor, overflow: false };
    }

    const run = [item];
    let next = sequence;
    for (let held = this.pending.get(next + 1); held; held = this.pending.get(next + 1)) {
      this.pending.delete(next + 1);
      run.push(held);
      next += 1;
    }
    return { run, cursor: next, overflow: false };
  }

  clear(): void {
    this.pending.clear();
  }
}

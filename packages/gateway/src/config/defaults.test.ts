import { describe, it, expect } from 'vitest';
import * as defaults from './defaults.js';

describe('gateway defaults', () => {
  it('listens on localhost:3000/webhook', () => {
    expect(defaults.WEBHOOK_HOST).toBe('127.0.0.1');
    expect(defaults.WEBHOOK_PORT).toBe(3000);
    expect(defaults.WEBHOOK_PATH).toBe('webhook');
  });

  it('keeps the last 1000 sequence numbers', () => {
    expect(defaults.WEBHOOK_DEDUP_CAPACITY).toBe(1_000);
  });

  it('limits bodies to 1 MB', () => {
    expect(defaults.BODY_SIZE_LIMIT_BYTES).toBe(1_048_576);
  });

  it('all numeric defaults are positive', () => {
    for (const value of Object.values(defaults)) {
      if (typeof value === 'number') {
        expect(value).toBeGreaterThan(0);
      }
    }
  });
});

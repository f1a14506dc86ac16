import { describe, it, expect, vi } from 'vitest';
import { onShutdown, parseIdList, parsePort } from './shared.js';

describe('parseIdList', () => {
  it('splits and trims comma-separated IDs', () => {
    expect(parseIdList(' 1001,1002 , ,1003')).toEqual(['1001', '1002', '1003']);
  });

  it('returns undefined for a missing or blank list', () => {
    expect(parseIdList(undefined)).toBeUndefined();
    expect(parseIdList(' , ')).toBeUndefined();
  });
});

describe('parsePort', () => {
  it('accepts ports in range', () => {
    expect(parsePort('1')).toBe(1);
    expect(parsePort('65535')).toBe(65535);
  });

  it('rejects everything else', () => {
    expect(parsePort('0')).toBeNull();
    expect(parsePort('65536')).toBeNull();
    expect(parsePort('80.5')).toBeNull();
    expect(parsePort('http')).toBeNull();
  });
});

describe('onShutdown', () => {
  it('stops once on the first signal and then unregisters', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const stop = vi.fn().mockResolvedValue(undefined);
    const before = process.listenerCount('SIGTERM');

    onShutdown(stop);
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);

    process.emit('SIGTERM');
    process.emit('SIGTERM');

    expect(stop).toHaveBeenCalledTimes(1);
    expect(process.listenerCount('SIGTERM')).toBe(before);
    vi.restoreAllMocks();
  });

  it('removes both handlers when cancelled', () => {
    const before = process.listenerCount('SIGINT');
    const remove = onShutdown(vi.fn().mockResolvedValue(undefined));

    remove();

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});

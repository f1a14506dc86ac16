/**
 * Session State Tests
 */

import { describe, it, expect } from 'vitest';
import { buildConnectUrl, createSessionState, redactUrl } from './session-state.js';

const endpoint = { url: 'wss://gateway.test/gateway', token: 'test-token' };

describe('createSessionState()', () => {
  it('starts without a session and with the cursor at zero', () => {
    const state = createSessionState({ compress: true });
    expect(state.sessionId).toBeNull();
    expect(state.cursor).toBe(0);
    expect(state.endpoint).toBeNull();
    expect(state.buffer.size).toBe(0);
    expect(state.buffer.capacity).toBe(1_000);
  });

  it('keeps a given endpoint and buffer capacity', () => {
    const state = createSessionState({ compress: false, bufferCapacity: 5, endpoint });
    expect(state.endpoint).toBe(endpoint);
    expect(state.buffer.capacity).toBe(5);
    expect(state.compress).toBe(false);
  });
});

describe('buildConnectUrl()', () => {
  it('adds token and compress', () => {
    const state = createSessionState({ compress: true });
    expect(buildConnectUrl(endpoint, state, false)).toBe(
      'wss://gateway.test/gateway?token=test-token&compress=1'
    );
  });

  it('keeps a token the directory already embedded', () => {
    const state = createSessionState({ compress: false });
    const url = buildConnectUrl(
      { url: 'wss://gateway.test/gateway?token=embedded', token: 'test-token' },
      state,
      false
    );
    expect(url).toBe('wss://gateway.test/gateway?token=embedded&compress=0');
  });

  it('adds resume parameters when resuming a held session', () => {
    const state = createSessionState({ compress: true });
    state.sessionId = 'session-1';
    state.cursor = 42;

    expect(buildConnectUrl(endpoint, state, true)).toBe(
      'wss://gateway.test/gateway?token=test-token&compress=1&resume=1&sn=42&session_id=session-1'
    );
  });

  it('does not resume without a session id', () => {
    const state = createSessionState({ compress: true });
    expect(buildConnectUrl(endpoint, state, true)).not.toContain('resume=');
  });
});

describe('redactUrl()', () => {
  it('masks the token', () => {
    expect(redactUrl('wss://gateway.test/gateway?token=test-token&compress=1')).toBe(
      'wss://gateway.test/gateway?token=***&compress=1'
    );
  });

  it('leaves URLs without a token alone', () => {
    expect(redactUrl('wss://gateway.test/gateway?compress=1')).toBe(
      'wss://gateway.test/gateway?compress=1'
    );
  });
});

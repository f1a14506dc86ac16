/**
 * Session State
 *
 * Everything that is scoped to one gateway session id. A reset never
 * patches fields: the session swaps in a new value from
 * createSessionState().
 */

import type { EventSignal } from '../protocol/signal.js';
import { ReorderBuffer } from './reorder-buffer.js';
import type { GatewayEndpoint } from './types.js';

export interface SessionState {
  endpoint: GatewayEndpoint | null;
  sessionId: string | null;
  /** Highest sequence delivered; starts at 0 */
  cursor: number;
  readonly buffer: ReorderBuffer<EventSignal>;
  readonly compress: boolean;
}

export function createSessionState(options: {
  compress: boolean;
  bufferCapacity?: number;
  endpoint?: GatewayEndpoint | null;
}): SessionState {
  return {
    endpoint: options.endpoint ?? null,
    sessionId: null,
    cursor: 0,
    buffer: new ReorderBuffer<EventSignal>(options.bufferCapacity),
    compress: options.compress,
  };
}

/**
 * Connection URL for an attempt. Resuming adds the held session id and
 * cursor so the server replays what was missed.
 */
export function buildConnectUrl(
  endpoint: GatewayEndpoint,
  state: SessionState,
  resume: boolean
): string {
  const url = new URL(endpoint.url);
  if (endpoint.token && !url.searchParams.has('token')) {
    url.searchParams.set('token', endpoint.token);
  }
  url.searchParams.set('compress', state.compress ? '1' : '0');

  if (resume && state.sessionId) {
    url.searchParams.set('resume', '1');
    url.searchParams.set('sn', String(state.cursor));
    url.searchParams.set('session_id', state.sessionId);
  }
  return url.toString();
}

/**
 * URL with the token masked, for logs
 */
export function redactUrl(raw: string): string {
  const url = new URL(raw);
  if (url.searchParams.has('token')) {
    url.searchParams.set('token', '***');
  }
  return url.toString();
}

/**
 * Gateway Client Defaults
 *
 * Named constants for the session's timing and capacity limits.
 * Every value can be overridden through GatewaySessionOptions.
 */

// ============================================================================
// Handshake
// ============================================================================

/** Wait for the Hello signal after the socket opens (ms) */
export const HELLO_TIMEOUT_MS = 6_000;

/** Wait for the transport handshake itself (ms) */
export const CONNECT_TIMEOUT_MS = 10_000;

// ============================================================================
// Heartbeat
// ============================================================================

/** Ping interval (ms) */
export const HEARTBEAT_INTERVAL_MS = 30_000;

/** Time allowed for the pong after a ping (ms) */
export const HEARTBEAT_ACK_TIMEOUT_MS = 6_000;

// ============================================================================
// Reconnect
// ============================================================================

/** Retries after the first failure before the session gives up */
export const RECONNECT_MAX_ATTEMPTS = 3;

/** Backoff unit: attempt n waits RECONNECT_BASE_DELAY_MS * 2^n (ms) */
export const RECONNECT_BASE_DELAY_MS = 1_000;

// ============================================================================
// Ordering
// ============================================================================

/** Out-of-order events held before the session forces a reconnect */
export const REORDER_BUFFER_CAPACITY = 1_000;

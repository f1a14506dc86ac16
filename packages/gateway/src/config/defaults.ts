/**
 * Gateway Default Configuration
 *
 * Named constants for the webhook server.
 * Override via environment variables where noted.
 */

// ============================================================================
// HTTP server
// ============================================================================

/** Listen address (WEBHOOK_HOST) */
export const WEBHOOK_HOST = '127.0.0.1';

/** Listen port (WEBHOOK_PORT) */
export const WEBHOOK_PORT = 3000;

/** Path segment the webhook is mounted at (WEBHOOK_PATH) */
export const WEBHOOK_PATH = 'webhook';

/** Maximum accepted request body (bytes) */
export const BODY_SIZE_LIMIT_BYTES = 1024 * 1024; // 1 MB

// ============================================================================
// Webhook
// ============================================================================

/** Recently seen sequence numbers kept for de-duplication */
export const WEBHOOK_DEDUP_CAPACITY = 1_000;

/** Channel type KOOK uses for the URL verification request */
export const WEBHOOK_CHALLENGE_CHANNEL = 'WEBHOOK_CHALLENGE';

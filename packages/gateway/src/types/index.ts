/**
 * Gateway types
 */

import type { EventData } from '@kookgate/core';

/**
 * API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

/**
 * Webhook server configuration
 */
export interface GatewayConfig {
  host: string;
  port: number;
  /** Path segment the webhook route is mounted at, without slashes */
  webhookPath: string;
  /** Token KOOK sends with the challenge and with every event */
  verifyToken: string;
  /** Inflate bodies sent with Content-Encoding deflate or gzip */
  decompress: boolean;
  /** Recently seen sequence numbers kept for de-duplication */
  dedupCapacity: number;
  bodyLimitBytes: number;
}

/**
 * Consumer of webhook events. The stream path's DeliverySink satisfies it.
 */
export interface WebhookEventSink {
  onEvent(data: EventData, sequence: number): void | Promise<void>;
}

/**
 * Result of one webhook delivery
 */
export type WebhookOutcome =
  | { type: 'challenge'; challenge: string }
  | { type: 'event'; sequence: number; duplicate: boolean };

/**
 * Health check status
 */
export interface HealthStatus {
  status: 'healthy';
  uptime: number;
  webhook: {
    path: string;
    seenSequences: number;
  };
}

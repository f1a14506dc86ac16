export { createWebhookRoutes, type WebhookRouteOptions } from './webhooks.js';
export { createHealthRoutes, type HealthRouteOptions } from './health.js';
export { safeKeyCompare, apiResponse, apiError, ERROR_CODES, type ErrorCode } from './helpers.js';

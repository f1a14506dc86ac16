/**
 * @kookgate/core
 *
 * Zero-dependency gateway session foundation: wire protocol, ordering,
 * heartbeats, reconnection and the contracts the transports implement.
 * Uses only Node.js built-in modules.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Logging
export * from './logging/index.js';

// Config
export * from './config/defaults.js';

// Protocol
export * from './protocol/index.js';

// Session
export * from './session/index.js';

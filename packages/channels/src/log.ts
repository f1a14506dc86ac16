/**
 * Logging utility, re-exported from @kookgate/core
 *
 * Usage:
 *   import { getLog } from './log.js';
 *   const log = getLog('KookBot');
 */

export { getLog } from '@kookgate/core';

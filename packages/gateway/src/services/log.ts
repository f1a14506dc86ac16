/**
 * Logging utility, re-exported from @kookgate/core
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Webhooks');
 *   log.info('Challenge answered');
 */

export { getLog } from '@kookgate/core';

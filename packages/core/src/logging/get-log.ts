/**
 * Logging Utility
 *
 * Scoped loggers for any module. Until the host installs a root logger
 * with setLogService(), records go to the console.
 *
 * Usage:
 *   import { getLog } from '@kookgate/core';
 *   const log = getLog('Session');
 *   log.info('Connected', { url });
 */

import type { ILogService, LogLevel } from './log-service.js';

let rootLogger: ILogService | null = null;
const fallbackLoggers = new Map<string, ILogService>();

function write(module: string, level: LogLevel, msg: string, data: unknown): void {
  // Loggers taken at import time follow a root installed later
  if (rootLogger) {
    rootLogger.child(module)[level](msg, data);
    return;
  }
  const out = level === 'info' ? console.log : console[level];
  if (data !== undefined) out(`[${module}]`, msg, data);
  else out(`[${module}]`, msg);
}

function createFallbackLogger(module: string): ILogService {
  return {
    debug(msg, data) { write(module, 'debug', msg, data); },
    info(msg, data) { write(module, 'info', msg, data); },
    warn(msg, data) { write(module, 'warn', msg, data); },
    error(msg, data) { write(module, 'error', msg, data); },
    child(sub: string) { return getLog(`${module}:${sub}`); },
  };
}

/**
 * Install the root logger. Loggers returned by getLog() afterwards are
 * children of it; console loggers taken earlier forward to it.
 */
export function setLogService(logger: ILogService | null): void {
  rootLogger = logger;
}

/**
 * Get a scoped logger for a module.
 */
export function getLog(module: string): ILogService {
  if (rootLogger) {
    return rootLogger.child(module);
  }

  let logger = fallbackLoggers.get(module);
  if (!logger) {
    logger = createFallbackLogger(module);
    fallbackLoggers.set(module, logger);
  }
  return logger;
}

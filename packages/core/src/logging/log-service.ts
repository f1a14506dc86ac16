/**
 * ILogService - structured logging interface
 *
 * Every module takes a scoped logger from getLog() instead of calling
 * console directly; the host application decides where records go.
 *
 *   const log = getLog('Session');
 *   log.info('Handshake complete', { sessionId });
 *   // Output: [Session] Handshake complete { sessionId: '...' }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: human-readable output with module prefix
 * - Production: one JSON record per line
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   log.info('Server started', { port: 3000 });
 *
 *   const sessionLog = log.child('Session');
 *   sessionLog.info('Connected');
 *   // Dev:  [Session] Connected
 *   // Prod: {"level":"info","ts":"...","module":"Session","msg":"Connected"}
 */

import type { ILogService, LogLevel } from '@kookgate/core';

export interface LogServiceOptions {
  level?: LogLevel;
  /** JSON lines instead of prefixed text; defaults to NODE_ENV === 'production' */
  json?: boolean;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly level: number;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.level = LOG_LEVELS[this.levelName];
    this.module = options?.module ?? null;
    this.json = options?.json ?? process.env.NODE_ENV === 'production';
  }

  debug(message: string, data?: unknown): void {
    if (this.level <= LOG_LEVELS.debug) this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    if (this.level <= LOG_LEVELS.info) this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    if (this.level <= LOG_LEVELS.warn) this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    const out = level === 'info' ? console.log : console[level];

    if (this.json) {
      out(
        JSON.stringify({
          level,
          ts: new Date().toISOString(),
          ...(this.module ? { module: this.module } : {}),
          msg: message,
          ...toRecord(data),
        })
      );
      return;
    }

    const line = this.module ? `[${this.module}] ${message}` : message;
    if (data !== undefined) {
      out(line, data);
    } else {
      out(line);
    }
  }
}

/**
 * Flatten log data into fields of the JSON record
 */
function toRecord(data: unknown): Record<string, unknown> {
  if (data === undefined) return {};
  if (data instanceof Error) return { error: data.message };
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return Object.fromEntries(Object.entries(data));
  }
  return { data };
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}

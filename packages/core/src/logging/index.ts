export type { ILogService, LogLevel } from './log-service.js';
export { getLog, setLogService } from './get-log.js';

export { createLogger, setLogLevel, getLogLevel, getLogHistory, clearLogs, onLog } from './logger.js';
export type { Logger, LogEntry, LogLevel } from './logger.js';

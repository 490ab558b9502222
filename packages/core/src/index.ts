// Types
export type { LocalDateTime, TaskRecord, ScanResult } from './types/index.js';
export type {
  TimestampFormat,
  TimestampMode,
  TimestampResult,
  TimestampFailure,
  ScanStats,
  ScanOutcome,
} from './types/index.js';
export {
  createLocalDateTime,
  formatLocalDateTime,
  localDateTimeToDate,
  localDateTimeFromDate,
  compareLocalDateTime,
  localDateTimeEquals,
  dayOfWeek,
  createTaskRecord,
  taskRecordEquals,
  formatTaskRecord,
  sortTaskRecords,
  isTimestampSuccess,
  isScanSuccess,
} from './types/index.js';

// Config
export { DEFAULT_MARKERS, DEFAULT_SCAN_OPTIONS, resolveScanOptions, getDefaultConfigPath, loadConfig, parseConfig } from './config/index.js';
export type { TaskMarkers, ScanOptions, OrgRemindConfig } from './config/index.js';

// Logging
export { createLogger, setLogLevel, getLogLevel, getLogHistory, clearLogs, onLog } from './logging/index.js';
export type { Logger, LogEntry, LogLevel } from './logging/index.js';

// Parsers
export { extractTimestamp, extractTimestampToken, parseTimestampToken, isTaskLine, buildTaskRecord, parseTaskRecord } from './parsers/index.js';
export type { BuildOptions } from './parsers/index.js';

// Scanner
export { findTaskFiles, TaskPool, scanDirectory, scanFileContent, splitLines } from './scanner/index.js';
export type { FileScanOptions, PoolStats } from './scanner/index.js';

// Queries
export { findUpcoming, findOverdue, nextTaskRecord, minutesUntil } from './query/index.js';

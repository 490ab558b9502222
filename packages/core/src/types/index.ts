export type { LocalDateTime } from './local-date-time.js';
export {
  createLocalDateTime,
  formatLocalDateTime,
  localDateTimeToDate,
  localDateTimeFromDate,
  compareLocalDateTime,
  localDateTimeEquals,
  dayOfWeek,
  daysInMonth,
  isLeapYear,
} from './local-date-time.js';
export type { TaskRecord, ScanResult } from './task-record.js';
export { createTaskRecord, taskRecordEquals, formatTaskRecord, sortTaskRecords } from './task-record.js';
export type {
  TimestampFormat,
  TimestampMode,
  TimestampResult,
  TimestampFailure,
  ScanStats,
  ScanOutcome,
} from './results.js';
export { isTimestampSuccess, isScanSuccess } from './results.js';

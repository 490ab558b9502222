import type { LocalDateTime } from './local-date-time.js';
import { compareLocalDateTime, formatLocalDateTime, localDateTimeEquals } from './local-date-time.js';

/** One scheduled or deadlined TODO line */
export interface TaskRecord {
  readonly text: string;
  readonly timestamp: LocalDateTime;
}

/** Every record found by one scan; order carries no meaning */
export type ScanResult = readonly TaskRecord[];

export function createTaskRecord(text: string, timestamp: LocalDateTime): TaskRecord {
  return Object.freeze({ text, timestamp });
}

export function taskRecordEquals(a: TaskRecord, b: TaskRecord): boolean {
  return a.text === b.text && localDateTimeEquals(a.timestamp, b.timestamp);
}

/** Debug form: `<text>,<timestamp>` */
export function formatTaskRecord(record: TaskRecord): string {
  return `${record.text},${formatLocalDateTime(record.timestamp)}`;
}

/** Ascending by timestamp, then text. Returns a new array. */
export function sortTaskRecords(records: readonly TaskRecord[]): TaskRecord[] {
  return [...records].sort(
    (a, b) => compareLocalDateTime(a.timestamp, b.timestamp) || (a.text < b.text ? -1 : a.text > b.text ? 1 : 0),
  );
}

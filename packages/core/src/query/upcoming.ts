/**
 * Diffs scan results against "now". Firing reminders is left to the caller.
 */

import type { TaskRecord } from '../types/task-record.js';
import { sortTaskRecords } from '../types/task-record.js';
import { localDateTimeToDate } from '../types/local-date-time.js';

const MINUTE_MS = 60_000;

function timeOf(record: TaskRecord): number {
  return localDateTimeToDate(record.timestamp).getTime();
}

/** Whole minutes from now until the record, negative once it has passed */
export function minutesUntil(record: TaskRecord, now: Date): number {
  return Math.floor((timeOf(record) - now.getTime()) / MINUTE_MS);
}

/** Records falling in [now, now + withinMinutes], earliest first */
export function findUpcoming(records: readonly TaskRecord[], now: Date, withinMinutes: number): TaskRecord[] {
  const start = now.getTime();
  const end = start + withinMinutes * MINUTE_MS;
  return sortTaskRecords(records.filter((r) => {
    const t = timeOf(r);
    return t >= start && t <= end;
  }));
}

/** Records strictly before now, earliest first */
export function findOverdue(records: readonly TaskRecord[], now: Date): TaskRecord[] {
  return sortTaskRecords(records.filter((r) => timeOf(r) < now.getTime()));
}

export function nextTaskRecord(records: readonly TaskRecord[], now: Date): TaskRecord | null {
  const pending = sortTaskRecords(records.filter((r) => timeOf(r) >= now.getTime()));
  return pending[0] ?? null;
}

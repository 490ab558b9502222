import type { LocalDateTime } from './local-date-time.js';
import type { ScanResult } from './task-record.js';

export type TimestampFormat = 'date-weekday-time' | 'date-weekday' | 'date-time' | 'date';

/**
 * compat: a `date-weekday-time` match returns the date at midnight.
 * corrected: every format returns exactly what it matched.
 */
export type TimestampMode = 'compat' | 'corrected';

export type TimestampResult =
  | { readonly type: 'success'; readonly value: LocalDateTime; readonly format: TimestampFormat }
  | { readonly type: 'structural-failure'; readonly message: string }
  | { readonly type: 'format-failure'; readonly token: string; readonly message: string };

export type TimestampFailure = Exclude<TimestampResult, { type: 'success' }>;

export interface ScanStats {
  readonly filesFound: number;
  readonly filesRead: number;
  readonly filesSkipped: number;
  readonly recordsFound: number;
}

export type ScanOutcome =
  | { readonly type: 'success'; readonly data: ScanResult; readonly stats: ScanStats }
  | { readonly type: 'directory-error'; readonly root: string; readonly message: string };

// Helper functions
export function isTimestampSuccess(
  r: TimestampResult,
): r is Extract<TimestampResult, { type: 'success' }> {
  return r.type === 'success';
}

export function isScanSuccess(o: ScanOutcome): o is Extract<ScanOutcome, { type: 'success' }> {
  return o.type === 'success';
}

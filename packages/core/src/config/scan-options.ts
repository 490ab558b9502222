import type { TimestampMode } from '../types/results.js';

export interface TaskMarkers {
  readonly taskMarker: string;
  readonly scheduleMarkers: readonly string[];
}

export interface ScanOptions extends TaskMarkers {
  /** File-name suffix of task files, dot included */
  readonly extension: string;
  readonly timestampMode: TimestampMode;
  /** Files read at once */
  readonly concurrency: number;
}

export const DEFAULT_MARKERS: TaskMarkers = Object.freeze({
  taskMarker: '*TODO',
  scheduleMarkers: Object.freeze(['DEADLINE', 'SCHEDULED']),
});

export const DEFAULT_SCAN_OPTIONS: ScanOptions = Object.freeze({
  ...DEFAULT_MARKERS,
  extension: '.org',
  timestampMode: 'compat',
  concurrency: 8,
});

/** Fill unset fields with defaults; concurrency is clamped to at least 1 */
export function resolveScanOptions(partial: Partial<ScanOptions> = {}): ScanOptions {
  const concurrency = partial.concurrency ?? DEFAULT_SCAN_OPTIONS.concurrency;
  return {
    extension: partial.extension ?? DEFAULT_SCAN_OPTIONS.extension,
    taskMarker: partial.taskMarker ?? DEFAULT_SCAN_OPTIONS.taskMarker,
    scheduleMarkers: partial.scheduleMarkers ?? DEFAULT_SCAN_OPTIONS.scheduleMarkers,
    timestampMode: partial.timestampMode ?? DEFAULT_SCAN_OPTIONS.timestampMode,
    concurrency: Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : DEFAULT_SCAN_OPTIONS.concurrency,
  };
}

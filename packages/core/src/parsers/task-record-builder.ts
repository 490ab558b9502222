/**
 * Turns one org line into a TaskRecord, or null.
 * A line whose timestamp does not parse yields null.
 */

import type { TaskMarkers } from '../config/scan-options.js';
import { DEFAULT_MARKERS } from '../config/scan-options.js';
import type { TimestampMode } from '../types/results.js';
import { isTimestampSuccess } from '../types/results.js';
import type { TaskRecord } from '../types/task-record.js';
import { createTaskRecord } from '../types/task-record.js';
import { createLogger } from '../logging/logger.js';
import { isTaskLine } from './line-classifier.js';
import { extractTimestamp } from './timestamp-parser.js';

const log = createLogger('task-record');

export interface BuildOptions extends TaskMarkers {
  readonly timestampMode: TimestampMode;
}

const DEFAULT_BUILD_OPTIONS: BuildOptions = { ...DEFAULT_MARKERS, timestampMode: 'compat' };

/** Everything after the first task marker, verbatim */
function taskText(line: string, marker: string): string | null {
  const idx = line.indexOf(marker);
  return idx === -1 ? null : line.slice(idx + marker.length);
}

/** Parse a line that is already known to be a task, skipping classification */
export function parseTaskRecord(line: string, options: BuildOptions = DEFAULT_BUILD_OPTIONS): TaskRecord | null {
  const text = taskText(line, options.taskMarker);
  if (text === null) return null;

  const result = extractTimestamp(line, options.timestampMode);
  if (!isTimestampSuccess(result)) {
    log.debug(`dropping line (${result.type}): ${result.message}`);
    return null;
  }
  return createTaskRecord(text, result.value);
}

export function buildTaskRecord(line: string, options: BuildOptions = DEFAULT_BUILD_OPTIONS): TaskRecord | null {
  if (!isTaskLine(line, options)) return null;
  return parseTaskRecord(line, options);
}

import type { TaskMarkers } from '../config/scan-options.js';
import { DEFAULT_MARKERS } from '../config/scan-options.js';

/** A task line carries the task marker and at least one schedule marker */
export function isTaskLine(line: string, markers: TaskMarkers = DEFAULT_MARKERS): boolean {
  return line.includes(markers.taskMarker) && markers.scheduleMarkers.some((m) => line.includes(m));
}

export {
  extractTimestamp,
  extractTimestampToken,
  parseTimestampToken,
} from './timestamp-parser.js';
export { isTaskLine } from './line-classifier.js';
export { buildTaskRecord, parseTaskRecord } from './task-record-builder.js';
export type { BuildOptions } from './task-record-builder.js';

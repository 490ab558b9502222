export { DEFAULT_MARKERS, DEFAULT_SCAN_OPTIONS, resolveScanOptions } from './scan-options.js';
export type { TaskMarkers, ScanOptions } from './scan-options.js';
export { getDefaultConfigPath, loadConfig, parseConfig } from './config-file.js';
export type { OrgRemindConfig } from './config-file.js';

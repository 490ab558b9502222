export { findTaskFiles } from './file-scanner.js';
export type { FileScanOptions } from './file-scanner.js';
export { TaskPool } from './task-pool.js';
export type { PoolStats } from './task-pool.js';
export { scanDirectory, scanFileContent, splitLines } from './aggregator.js';

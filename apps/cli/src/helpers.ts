/**
 * CLI helpers: directory resolution, option parsing, error handling.
 */

import type { OrgRemindConfig, ScanOptions } from '@org-remind/core';
import * as out from './output.js';

/** Flags shared by every scanning command */
export type ScanFlags = {
  config?: string;
  ext?: string;
  marker?: string;
  corrected?: boolean;
  concurrency?: string;
};

export type ConfigLoader = (path?: string) => OrgRemindConfig;

/**
 * Resolve the directory to scan.
 * Priority: explicit argument > config orgDir > cwd.
 */
export function resolveScanDir(dirArg: string | undefined, config: OrgRemindConfig, cwd?: string): string {
  return dirArg ?? config.orgDir ?? cwd ?? process.cwd();
}

/** Parse a whole number >= 1, or null */
export function parsePositiveInt(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const n = parseInt(value, 10);
  return n >= 1 ? n : null;
}

/**
 * Merge command-line flags over the configured scan options.
 * Returns an error message for a bad flag.
 */
export function resolveScanFlags(flags: ScanFlags, base: ScanOptions): ScanOptions | string {
  let concurrency = base.concurrency;
  if (flags.concurrency !== undefined) {
    const n = parsePositiveInt(flags.concurrency);
    if (n === null) return `Invalid concurrency: ${flags.concurrency}`;
    concurrency = n;
  }

  return {
    ...base,
    extension: flags.ext ?? base.extension,
    taskMarker: flags.marker ?? base.taskMarker,
    timestampMode: flags.corrected ? 'corrected' : base.timestampMode,
    concurrency,
  };
}

/** Print an error and mark the process as failed */
export function fail(message: string): void {
  out.error(message);
  process.exitCode = 1;
}

/**
 * Reads ~/.config/org-remind/config.json (or the platform equivalent).
 * Every field is checked on its own; a bad field falls back to its default.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { TimestampMode } from '../types/results.js';
import type { ScanOptions } from './scan-options.js';
import { resolveScanOptions } from './scan-options.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('config');

const CONFIG_FILE = 'config.json';

export interface OrgRemindConfig {
  /** Directory scanned when none is given; null means the caller decides */
  readonly orgDir: string | null;
  readonly scan: ScanOptions;
}

export function getDefaultConfigPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'org-remind');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'org-remind');
  } else {
    dir = join(process.env['XDG_CONFIG_HOME'] ?? join(homedir(), '.config'), 'org-remind');
  }

  return join(dir, CONFIG_FILE);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isTimestampMode(value: unknown): value is TimestampMode {
  return value === 'compat' || value === 'corrected';
}

function pick<T>(data: Record<string, unknown>, key: string, guard: (v: unknown) => v is T): T | undefined {
  if (!(key in data)) return undefined;
  const value = data[key];
  if (guard(value)) return value;
  log.warn(`ignoring "${key}": unexpected ${typeof value}`);
  return undefined;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/** Build a config from already-parsed JSON */
export function parseConfig(data: unknown, env: NodeJS.ProcessEnv = process.env): OrgRemindConfig {
  const fields = isRecord(data) ? data : {};
  if (!isRecord(data)) log.warn('config root is not an object, using defaults');

  const orgDir = env['ORG_REMIND_DIR'] || pick(fields, 'orgDir', isString) || null;

  return {
    orgDir,
    scan: resolveScanOptions({
      extension: pick(fields, 'extension', isString),
      taskMarker: pick(fields, 'taskMarker', isString),
      scheduleMarkers: pick(fields, 'scheduleMarkers', isStringArray),
      timestampMode: pick(fields, 'timestampMode', isTimestampMode),
      concurrency: pick(fields, 'concurrency', isNumber),
    }),
  };
}

export function loadConfig(filePath: string = getDefaultConfigPath(), env: NodeJS.ProcessEnv = process.env): OrgRemindConfig {
  if (!existsSync(filePath)) return parseConfig({}, env);

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    log.warn(`could not read ${filePath}, using defaults:`, err);
    data = {};
  }
  return parseConfig(data, env);
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const MAX_ENTRIES = 200;
const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env['ORG_REMIND_LOG_LEVEL']?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'warn';
}

let threshold: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function formatArg(a: unknown): string {
  if (typeof a === 'string') return a;
  if (a instanceof Error) return a.message;
  return JSON.stringify(a);
}

function push(level: LogLevel, scope: string, args: unknown[]) {
  const message = args.map(formatArg).join(' ');
  const entry: LogEntry = { timestamp: Date.now(), level, scope, message };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();
  for (const cb of listeners) cb(entry);

  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const prefix = `[${scope.toUpperCase()}]:`;
  switch (level) {
    case 'warn': console.warn(prefix, message); break;
    case 'error': console.error(prefix, message); break;
    default: console.log(prefix, message);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...args) => push('debug', scope, args),
    info: (...args) => push('info', scope, args),
    warn: (...args) => push('warn', scope, args),
    error: (...args) => push('error', scope, args),
  };
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs() {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}

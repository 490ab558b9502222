/**
 * Extracts the `<...>` timestamp of an org line and parses it.
 * Accepted token shapes, tried in this order:
 *   2023-08-08 Tue 10:06 | 2023-08-08 Tue | 2023-08-08 10:06 | 2023-08-08
 *
 * In compat mode (the default) a match of the first shape yields the date at
 * midnight, dropping the time of day; `corrected` keeps the time.
 */

import type { LocalDateTime } from '../types/local-date-time.js';
import { createLocalDateTime, dayOfWeek } from '../types/local-date-time.js';
import type { TimestampFormat, TimestampMode, TimestampResult } from '../types/results.js';

const DATE = String.raw`(\d{4})-(\d{1,2})-(\d{1,2})`;
const WEEKDAY = String.raw`([A-Za-z]+)`;
const TIME = String.raw`(\d{1,2}):(\d{1,2})`;

const DATE_WEEKDAY_TIME_RE = new RegExp(`^${DATE} +${WEEKDAY} +${TIME}$`);
const DATE_WEEKDAY_RE = new RegExp(`^${DATE} +${WEEKDAY}$`);
const DATE_TIME_RE = new RegExp(`^${DATE} +${TIME}$`);
const DATE_RE = new RegExp(`^${DATE}$`);

const FORMAT_LABELS: Record<TimestampFormat, string> = {
  'date-weekday-time': 'YYYY-MM-DD ddd HH:MM',
  'date-weekday': 'YYYY-MM-DD ddd',
  'date-time': 'YYYY-MM-DD HH:MM',
  'date': 'YYYY-MM-DD',
};

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

type Attempt =
  | { readonly ok: true; readonly value: LocalDateTime }
  | { readonly ok: false; readonly message: string };

/** 0 = Sunday; short (Tue) or long (Tuesday) English names, any case */
function weekdayIndex(name: string): number | null {
  const lower = name.toLowerCase();
  const idx = WEEKDAYS.findIndex(
    (full) => lower === full || (lower.length === 3 && full.startsWith(lower)),
  );
  return idx === -1 ? null : idx;
}

function toInt(s: string | undefined): number {
  return s === undefined ? NaN : parseInt(s, 10);
}

function attempt(token: string, format: TimestampFormat): Attempt {
  const label = FORMAT_LABELS[format];
  let m: RegExpExecArray | null = null;
  let weekday: string | undefined;
  let hour = 0;
  let minute = 0;

  switch (format) {
    case 'date-weekday-time':
      m = DATE_WEEKDAY_TIME_RE.exec(token);
      if (m) { weekday = m[4]; hour = toInt(m[5]); minute = toInt(m[6]); }
      break;
    case 'date-weekday':
      m = DATE_WEEKDAY_RE.exec(token);
      if (m) weekday = m[4];
      break;
    case 'date-time':
      m = DATE_TIME_RE.exec(token);
      if (m) { hour = toInt(m[4]); minute = toInt(m[5]); }
      break;
    case 'date':
      m = DATE_RE.exec(token);
      break;
  }

  if (!m) return { ok: false, message: `"${token}" does not match ${label}` };

  const year = toInt(m[1]);
  const month = toInt(m[2]);
  const day = toInt(m[3]);
  const value = createLocalDateTime(year, month, day, hour, minute);
  if (!value) return { ok: false, message: `"${token}" is out of range for ${label}` };

  if (weekday !== undefined) {
    const named = weekdayIndex(weekday);
    if (named === null) return { ok: false, message: `"${weekday}" is not a weekday name` };
    const actual = dayOfWeek(year, month, day);
    if (named !== actual) {
      return { ok: false, message: `${weekday} does not fall on ${m[1]}-${m[2]}-${m[3]}` };
    }
  }

  return { ok: true, value };
}

function atMidnight(v: LocalDateTime): LocalDateTime {
  return createLocalDateTime(v.year, v.month, v.day) ?? v;
}

/** Text strictly between the first `<` and the first `>` after it */
export function extractTimestampToken(line: string): string | null {
  const open = line.indexOf('<');
  if (open === -1) return null;
  const close = line.indexOf('>', open + 1);
  if (close === -1) return null;
  return line.slice(open + 1, close);
}

/** Run the format cascade on a bare token */
export function parseTimestampToken(token: string, mode: TimestampMode = 'compat'): TimestampResult {
  const withTime = attempt(token, 'date-weekday-time');
  if (withTime.ok) {
    const value = mode === 'compat' ? atMidnight(withTime.value) : withTime.value;
    return { type: 'success', value, format: 'date-weekday-time' };
  }

  for (const format of ['date-weekday', 'date-time', 'date'] as const) {
    const result = attempt(token, format);
    if (result.ok) return { type: 'success', value: result.value, format };
  }

  return { type: 'format-failure', token, message: withTime.message };
}

export function extractTimestamp(line: string, mode: TimestampMode = 'compat'): TimestampResult {
  const token = extractTimestampToken(line);
  if (token === null) {
    return {
      type: 'structural-failure',
      message: line.includes('<') ? 'timestamp is missing its closing ">"' : 'no "<" timestamp in line',
    };
  }
  return parseTimestampToken(token, mode);
}

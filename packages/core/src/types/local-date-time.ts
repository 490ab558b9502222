/**
 * Zone-less calendar date and wall-clock time, as written in org timestamps.
 * Values are plain frozen objects; compare them with the helpers below.
 */

export interface LocalDateTime {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2: return isLeapYear(year) ? 29 : 28;
    case 4: case 6: case 9: case 11: return 30;
    default: return 31;
  }
}

/** Day of week for a proleptic Gregorian date, 0 = Sunday */
export function dayOfWeek(year: number, month: number, day: number): number {
  // Sakamoto's method
  const offsets = [0, 3, 2, 5, 0, 3, 5, 1, 4, 6, 2, 4];
  const y = month < 3 ? year - 1 : year;
  const offset = offsets[month - 1] ?? 0;
  const raw = y + Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400) + offset + day;
  return ((raw % 7) + 7) % 7;
}

/** Returns null when the fields do not name a real date and time */
export function createLocalDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): LocalDateTime | null {
  const fields = [year, month, day, hour, minute, second];
  if (!fields.every(Number.isInteger)) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) return null;
  return Object.freeze({ year, month, day, hour, minute, second });
}

/** Canonical text form: yyyy-MM-dd HH:mm:ss */
export function formatLocalDateTime(v: LocalDateTime): string {
  return `${pad(v.year, 4)}-${pad(v.month)}-${pad(v.day)} ${pad(v.hour)}:${pad(v.minute)}:${pad(v.second)}`;
}

/** The same wall-clock time as a Date in the process's local zone */
export function localDateTimeToDate(v: LocalDateTime): Date {
  return new Date(v.year, v.month - 1, v.day, v.hour, v.minute, v.second);
}

export function localDateTimeFromDate(d: Date): LocalDateTime {
  return Object.freeze({
    year: d.getFullYear(),
    month: d.getMonth() + 1,
    day: d.getDate(),
    hour: d.getHours(),
    minute: d.getMinutes(),
    second: d.getSeconds(),
  });
}

export function compareLocalDateTime(a: LocalDateTime, b: LocalDateTime): number {
  return (
    a.year - b.year ||
    a.month - b.month ||
    a.day - b.day ||
    a.hour - b.hour ||
    a.minute - b.minute ||
    a.second - b.second
  );
}

export function localDateTimeEquals(a: LocalDateTime, b: LocalDateTime): boolean {
  return compareLocalDateTime(a, b) === 0;
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTaskRecord, parseTaskRecord } from '../../src/parsers/task-record-builder.js';
import { formatTaskRecord } from '../../src/types/task-record.js';
import { clearLogs, getLogHistory, setLogLevel, getLogLevel } from '../../src/logging/logger.js';
import type { LogLevel } from '../../src/logging/logger.js';
import { DEFAULT_MARKERS } from '../../src/config/scan-options.js';

const corrected = { ...DEFAULT_MARKERS, timestampMode: 'corrected' as const };

describe('parseTaskRecord', () => {
  it('keeps everything after the marker as the text', () => {
    const record = parseTaskRecord('*TODO text <2023-08-08>');
    expect(record).not.toBeNull();
    expect(record && formatTaskRecord(record)).toBe(' text <2023-08-08>,2023-08-08 00:00:00');
  });

  it('returns null without the task marker', () => {
    expect(parseTaskRecord('text <2023-08-08>')).toBeNull();
  });

  it('returns null when the timestamp has no date', () => {
    expect(parseTaskRecord('*TODO x <Mon 10:10>')).toBeNull();
  });
});

describe('buildTaskRecord', () => {
  let previous: LogLevel;

  beforeEach(() => {
    previous = getLogLevel();
    setLogLevel('error');
    clearLogs();
  });

  afterEach(() => {
    setLogLevel(previous);
  });

  it('returns null for lines without a schedule marker', () => {
    expect(buildTaskRecord('*TODO text <2023-08-08>')).toBeNull();
  });

  it('builds a record for a deadline line', () => {
    const record = buildTaskRecord('*TODO pay rent DEADLINE: <2023-09-01 Fri 10:00>');
    expect(record && formatTaskRecord(record)).toBe(' pay rent DEADLINE: <2023-09-01 Fri 10:00>,2023-09-01 00:00:00');
  });

  it('keeps the time in corrected mode', () => {
    const record = buildTaskRecord('*TODO pay rent DEADLINE: <2023-09-01 Fri 10:00>', corrected);
    expect(record && formatTaskRecord(record)).toBe(' pay rent DEADLINE: <2023-09-01 Fri 10:00>,2023-09-01 10:00:00');
  });

  it('keeps text that follows the timestamp', () => {
    const record = buildTaskRecord('*TODO call SCHEDULED: <2023-08-08> later');
    expect(record?.text).toBe(' call SCHEDULED: <2023-08-08> later');
  });

  it('takes the text after the marker when the timestamp comes first', () => {
    const record = buildTaskRecord('SCHEDULED: <2023-08-08> *TODO tidy');
    expect(record?.text).toBe(' tidy');
  });

  it('leaves a repeated timestamp in the text untouched', () => {
    const record = buildTaskRecord('SCHEDULED: <2023-08-08> *TODO a <2023-08-08>');
    expect(record?.text).toBe(' a <2023-08-08>');
  });

  it('keeps the deadline timestamp in the text', () => {
    const record = buildTaskRecord('*TODO: ranger ma chambre DEADLINE: <2023-08-08>');
    expect(record?.text).toBe(': ranger ma chambre DEADLINE: <2023-08-08>');
  });

  it.each([
    '*TODO x SCHEDULED: <Mon 10:10>',
    '**TODO x DEADLINE: <10:10>',
    '*TODO x DEADLINE: no timestamp',
    '*TODO x DEADLINE: <2023-08-08',
  ])('drops %j', (line) => {
    expect(buildTaskRecord(line)).toBeNull();
  });

  it('returns frozen records', () => {
    const record = buildTaskRecord('*TODO x DEADLINE: <2023-08-08>');
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('logs dropped lines at debug level', () => {
    buildTaskRecord('*TODO x SCHEDULED: <Mon 10:10>');
    const entries = getLogHistory().filter((e) => e.scope === 'task-record');
    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('debug');
    expect(entries[0]?.message).toBe('dropping line (format-failure): "Mon 10:10" does not match YYYY-MM-DD ddd HH:MM');
  });
});

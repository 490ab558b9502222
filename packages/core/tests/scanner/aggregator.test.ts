import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { scanDirectory, scanFileContent, splitLines } from '../../src/scanner/aggregator.js';
import { DEFAULT_MARKERS } from '../../src/config/scan-options.js';
import { formatTaskRecord, sortTaskRecords } from '../../src/types/task-record.js';
import type { ScanOutcome } from '../../src/types/results.js';
import { setLogLevel, getLogLevel } from '../../src/logging/logger.js';
import type { LogLevel } from '../../src/logging/logger.js';

let root: string;
let previousLevel: LogLevel;

function write(name: string, content: string | Buffer): void {
  const file = join(root, name);
  mkdirSync(join(file, '..'), { recursive: true });
  writeFileSync(file, content);
}

function lines(outcome: ScanOutcome): string[] {
  if (outcome.type !== 'success') throw new Error(`scan failed: ${outcome.message}`);
  return sortTaskRecords(outcome.data).map(formatTaskRecord);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'org-remind-scan-test-'));
  previousLevel = getLogLevel();
  setLogLevel('error');
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  setLogLevel(previousLevel);
});

describe('splitLines', () => {
  it('splits on \\n and strips a trailing \\r', () => {
    expect(splitLines('a\r\nb\nc')).toEqual(['a', 'b', 'c']);
  });

  it('does not produce a final empty line', () => {
    expect(splitLines('a\n')).toEqual(['a']);
    expect(splitLines('')).toEqual([]);
  });

  it('keeps empty lines in the middle', () => {
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
  });
});

describe('scanFileContent', () => {
  const options = { ...DEFAULT_MARKERS, timestampMode: 'compat' as const };

  it('builds one record per qualifying line', () => {
    const content = [
      '#+TITLE: Home',
      '* Chores',
      '*TODO vacuum SCHEDULED: <2023-08-08 Tue>',
      '*TODO plain todo without date',
      '*TODO broken DEADLINE: <soon>',
      '*TODO taxes DEADLINE: <2023-09-01 10:30>',
    ].join('\r\n');

    expect(scanFileContent(content, options).map(formatTaskRecord)).toEqual([
      ' vacuum SCHEDULED: <2023-08-08 Tue>,2023-08-08 00:00:00',
      ' taxes DEADLINE: <2023-09-01 10:30>,2023-09-01 10:30:00',
    ]);
  });
});

describe('scanDirectory', () => {
  it('collects records from every readable file and skips the rest', async () => {
    write('home.org', '*TODO vacuum SCHEDULED: <2023-08-08>\nnotes\n*TODO taxes DEADLINE: <2023-09-01 10:30>\n');
    write('work/empty.org', '* nothing scheduled here\n');
    write(
      'broken.org',
      Buffer.concat([Buffer.from('*TODO lost DEADLINE: <2023-08-08>\n'), Buffer.from([0xc3, 0x28])]),
    );

    const outcome = await scanDirectory(root);

    expect(lines(outcome)).toEqual([
      ' vacuum SCHEDULED: <2023-08-08>,2023-08-08 00:00:00',
      ' taxes DEADLINE: <2023-09-01 10:30>,2023-09-01 10:30:00',
    ]);
    expect(outcome.type === 'success' && outcome.stats).toEqual({
      filesFound: 3,
      filesRead: 2,
      filesSkipped: 1,
      recordsFound: 2,
    });
  });

  it('ignores files inside hidden directories', async () => {
    write('inbox.org', '*TODO visible DEADLINE: <2023-08-08>\n');
    write('.cache/inbox.org', '*TODO hidden DEADLINE: <2023-08-08>\n');

    expect(lines(await scanDirectory(root))).toEqual([' visible DEADLINE: <2023-08-08>,2023-08-08 00:00:00']);
  });

  it('returns an empty result for a tree without task files', async () => {
    write('readme.md', '*TODO not an org file DEADLINE: <2023-08-08>\n');

    const outcome = await scanDirectory(root);
    expect(outcome.type).toBe('success');
    expect(lines(outcome)).toEqual([]);
  });

  it('yields the same records on repeated scans', async () => {
    for (let i = 0; i < 5; i++) {
      write(`file-${i}.org`, `*TODO task ${i} DEADLINE: <2023-08-0${i + 1}>\n*TODO other ${i} SCHEDULED: <2023-09-0${i + 1} 08:00>\n`);
    }

    const first = lines(await scanDirectory(root, { concurrency: 2 }));
    const second = lines(await scanDirectory(root, { concurrency: 4 }));
    expect(first).toHaveLength(10);
    expect(second).toEqual(first);
  });

  it('applies scan options', async () => {
    write('list.txt', '- TODO call mum due: <2023-08-08 Tue 18:00>\n');
    write('inbox.org', '*TODO ignored DEADLINE: <2023-08-08>\n');

    const outcome = await scanDirectory(root, {
      extension: '.txt',
      taskMarker: 'TODO',
      scheduleMarkers: ['due:'],
      timestampMode: 'corrected',
    });
    expect(lines(outcome)).toEqual([' call mum due: <2023-08-08 Tue 18:00>,2023-08-08 18:00:00']);
  });

  it('fails when the root does not exist', async () => {
    const missing = join(root, 'missing');
    const outcome = await scanDirectory(missing);
    expect(outcome.type).toBe('directory-error');
    expect(outcome.type === 'directory-error' && outcome.root).toBe(missing);
  });

  it('fails when the root is a file', async () => {
    write('inbox.org', '');
    const file = join(root, 'inbox.org');
    expect(await scanDirectory(file)).toEqual({
      type: 'directory-error',
      root: file,
      message: `${file} is not a directory`,
    });
  });
});

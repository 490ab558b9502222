/**
 * Directory scan: list task files, read them through a bounded pool,
 * build records line by line and flatten the per-file lists.
 */

import { readFile, stat } from 'node:fs/promises';
import { TextDecoder } from 'node:util';
import type { ScanOptions } from '../config/scan-options.js';
import { resolveScanOptions } from '../config/scan-options.js';
import type { ScanOutcome } from '../types/results.js';
import type { TaskRecord } from '../types/task-record.js';
import { buildTaskRecord } from '../parsers/task-record-builder.js';
import type { BuildOptions } from '../parsers/task-record-builder.js';
import { createLogger } from '../logging/logger.js';
import { findTaskFiles } from './file-scanner.js';
import { TaskPool } from './task-pool.js';

const log = createLogger('scan');

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Lines split on \n with a trailing \r removed */
export function splitLines(content: string): string[] {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/** Records of one file's text */
export function scanFileContent(content: string, options: BuildOptions): TaskRecord[] {
  const records: TaskRecord[] = [];
  for (const line of splitLines(content)) {
    const record = buildTaskRecord(line, options);
    if (record) records.push(record);
  }
  return records;
}

/** File text, or null when it cannot be read or is not valid UTF-8 */
async function readTaskFile(filePath: string): Promise<string | null> {
  try {
    return utf8.decode(await readFile(filePath));
  } catch (err) {
    log.debug(`skipping ${filePath}:`, err);
    return null;
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function scanDirectory(root: string, partial: Partial<ScanOptions> = {}): Promise<ScanOutcome> {
  const options = resolveScanOptions(partial);

  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      return { type: 'directory-error', root, message: `${root} is not a directory` };
    }
  } catch (err) {
    return { type: 'directory-error', root, message: describeError(err) };
  }

  const files = await findTaskFiles(root, options);
  log.debug(`found ${files.length} ${options.extension} files under ${root}`);

  const pool = new TaskPool(options.concurrency);
  const perFile = await pool.map(files, async (filePath) => {
    const content = await readTaskFile(filePath);
    return content === null ? null : scanFileContent(content, options);
  });

  const data: TaskRecord[] = [];
  let filesRead = 0;
  for (const records of perFile) {
    if (records === null) continue;
    filesRead++;
    data.push(...records);
  }

  const stats = {
    filesFound: files.length,
    filesRead,
    filesSkipped: files.length - filesRead,
    recordsFound: data.length,
  };
  log.info(`scanned ${root}: ${stats.recordsFound} tasks in ${filesRead}/${files.length} files`);

  return { type: 'success', data, stats };
}

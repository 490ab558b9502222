import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { createLogger } from '../logging/logger.js';

const log = createLogger('scanner');

export interface FileScanOptions {
  readonly extension: string;
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

async function walk(dir: string, extension: string, found: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    log.debug(`skipping unreadable directory ${dir}:`, err);
    return;
  }

  const subdirs: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!isHidden(entry.name)) subdirs.push(fullPath);
    } else if (entry.isFile() && entry.name.endsWith(extension)) {
      found.push(fullPath);
    }
  }

  await Promise.all(subdirs.map((sub) => walk(sub, extension, found)));
}

/**
 * Every regular file under `root` whose name ends with `extension`.
 * Directories below root starting with "." are pruned; symlinks are not followed.
 */
export async function findTaskFiles(root: string, options: FileScanOptions): Promise<string[]> {
  const found: string[] = [];
  await walk(resolve(root), options.extension, found);
  return found;
}

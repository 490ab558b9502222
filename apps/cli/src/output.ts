/**
 * chalk-based output for the CLI.
 */

import chalk from 'chalk';
import type { ScanStats, TaskRecord } from '@org-remind/core';
import { formatTaskRecord, minutesUntil } from '@org-remind/core';

// --- Formatting functions ---

export function formatRecord(record: TaskRecord): string {
  return formatTaskRecord(record);
}

/** "in 5 min", "in 2h 10m", "now", "30 min ago" */
export function formatRelative(minutes: number): string {
  if (minutes === 0) return 'now';
  const abs = Math.abs(minutes);
  const span = abs < 60 ? `${abs} min` : `${Math.floor(abs / 60)}h ${abs % 60}m`;
  return minutes > 0 ? `in ${span}` : `${span} ago`;
}

export function formatDueLabel(record: TaskRecord, now: Date): string {
  const minutes = minutesUntil(record, now);
  const label = formatRelative(minutes);
  if (minutes < 0) return chalk.red(label);
  if (minutes <= 15) return chalk.yellow(label);
  return chalk.dim(label);
}

export function formatSummary(stats: ScanStats): string {
  const skipped = stats.filesSkipped > 0 ? `, ${stats.filesSkipped} skipped` : '';
  return chalk.dim(`${stats.recordsFound} tasks in ${stats.filesRead}/${stats.filesFound} files${skipped}`);
}

// --- Basic output ---

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}

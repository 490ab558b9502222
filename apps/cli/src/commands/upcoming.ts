import { Command } from 'commander';
import chalk from 'chalk';
import { scanDirectory, findUpcoming, findOverdue, isScanSuccess } from '@org-remind/core';
import type { TaskRecord } from '@org-remind/core';
import * as out from '../output.js';
import $try from '../utils/try.js';
import { fail, parsePositiveInt, resolveScanDir, resolveScanFlags } from '../helpers.js';
import type { ConfigLoader, ScanFlags } from '../helpers.js';
import { addScanOptions } from './scan.js';

type UpcomingFlags = ScanFlags & {
  within: string;
  overdue?: boolean;
};

function printRecords(records: TaskRecord[], now: Date): void {
  for (const record of records) {
    out.info(`${out.formatDueLabel(record, now)}  ${out.formatRecord(record)}`);
  }
}

async function runUpcoming(
  dir: string | undefined,
  flags: UpcomingFlags,
  loadConfig: ConfigLoader,
  clock: () => Date,
): Promise<void> {
  const within = parsePositiveInt(flags.within);
  if (within === null) {
    fail(`Invalid window: ${flags.within}`);
    return;
  }

  const config = loadConfig(flags.config);
  const options = resolveScanFlags(flags, config.scan);
  if (typeof options === 'string') {
    fail(options);
    return;
  }

  const outcome = await scanDirectory(resolveScanDir(dir, config), options);
  if (!isScanSuccess(outcome)) {
    fail(`Cannot scan ${outcome.root}: ${outcome.message}`);
    return;
  }

  const now = clock();
  if (flags.overdue) {
    const overdue = findOverdue(outcome.data, now);
    if (overdue.length > 0) {
      out.info(chalk.bold.underline('Overdue'));
      printRecords(overdue, now);
      out.info('');
    }
  }

  const upcoming = findUpcoming(outcome.data, now, within);
  if (upcoming.length === 0) {
    out.info(chalk.dim(`Nothing due in the next ${within} min`));
    return;
  }
  printRecords(upcoming, now);
}

export function createUpcomingCommand(loadConfig: ConfigLoader, clock: () => Date = () => new Date()): Command {
  return addScanOptions(
    new Command('upcoming')
      .description('Show tasks due within the next N minutes')
      .argument('[dir]', 'Directory to scan (default: configured orgDir, then cwd)'),
  )
    .option('-w, --within <minutes>', 'Window size in minutes', '60')
    .option('--overdue', 'Also show tasks whose time has passed')
    .action(async (dir: string | undefined, _opts: unknown, cmd: Command) => {
      const [err] = await $try(() => runUpcoming(dir, cmd.optsWithGlobals<UpcomingFlags>(), loadConfig, clock));
      if (err) fail(err.message);
    });
}

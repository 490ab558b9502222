import { Command } from 'commander';
import { scanDirectory, sortTaskRecords, formatLocalDateTime, isScanSuccess } from '@org-remind/core';
import * as out from '../output.js';
import $try from '../utils/try.js';
import { fail, resolveScanDir, resolveScanFlags } from '../helpers.js';
import type { ConfigLoader, ScanFlags } from '../helpers.js';

type ScanCommandFlags = ScanFlags & {
  json?: boolean;
};

export function addScanOptions(cmd: Command): Command {
  return cmd
    .option('-e, --ext <ext>', 'File extension to scan for (default: .org)')
    .option('-m, --marker <marker>', 'Task marker (default: *TODO)')
    .option('--corrected', 'Keep the time of day on "YYYY-MM-DD ddd HH:MM" timestamps')
    .option('--concurrency <n>', 'Files read at once');
}

async function runScan(dir: string | undefined, flags: ScanCommandFlags, loadConfig: ConfigLoader): Promise<void> {
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

  const records = sortTaskRecords(outcome.data);
  if (flags.json) {
    const rows = records.map((r) => ({ text: r.text, timestamp: formatLocalDateTime(r.timestamp) }));
    out.info(JSON.stringify(rows, null, 2));
    return;
  }

  for (const record of records) {
    out.info(out.formatRecord(record));
  }
  out.info(out.formatSummary(outcome.stats));
}

export function createScanCommand(loadConfig: ConfigLoader): Command {
  return addScanOptions(
    new Command('scan')
      .description('List every scheduled or deadlined TODO under a directory')
      .argument('[dir]', 'Directory to scan (default: configured orgDir, then cwd)'),
  )
    .option('--json', 'Print records as JSON')
    .action(async (dir: string | undefined, _opts: unknown, cmd: Command) => {
      const [err] = await $try(() => runScan(dir, cmd.optsWithGlobals<ScanCommandFlags>(), loadConfig));
      if (err) fail(err.message);
    });
}

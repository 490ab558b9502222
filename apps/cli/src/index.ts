#!/usr/bin/env tsx

import { Command } from 'commander';
import { loadConfig } from '@org-remind/core';

import { createScanCommand } from './commands/scan.js';
import { createUpcomingCommand } from './commands/upcoming.js';

// Build the CLI program
const program = new Command()
  .name('org-remind')
  .description('Find scheduled and deadlined TODOs in org files')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: platform config dir)');

// Register commands
program.addCommand(createScanCommand(loadConfig));
program.addCommand(createUpcomingCommand(loadConfig));

await program.parseAsync();

#!/usr/bin/env node

import { Command } from 'commander';

import { createConvertCommand } from './commands/convert.js';
import { createBatchCommand } from './commands/batch.js';
import { createDetectCommand } from './commands/detect.js';

// Build the CLI program
const program = new Command()
  .name('remport')
  .description('Convert reminders JSON exports to CSV import files')
  .version('1.0.0');

// Register commands
program.addCommand(createConvertCommand());
program.addCommand(createBatchCommand());
program.addCommand(createDetectCommand());

program.parse();

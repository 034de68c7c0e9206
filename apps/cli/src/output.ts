/**
 * chalk-based console output for the CLI. The core never prints; everything
 * user-facing goes through here.
 */

import chalk from 'chalk';
import type { FileConversion } from '@remport/core';
import { Column } from '@remport/core';

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function detail(message: string): void {
  console.log(chalk.dim(`  ${message}`));
}

// --- Conversion output ---

export function banner(): void {
  console.log(chalk.bold('Reminders → CSV Converter'));
  console.log('='.repeat(40));
}

export function dryRunNotice(): void {
  warning('[DRY RUN MODE - No files will be written]');
  console.log();
}

export function printWarnings(warnings: readonly string[]): void {
  for (const w of warnings) warning(`  ⚠ ${w}`);
}

/** Per-file details; the noisy parts only with --verbose */
export function printConversion(data: FileConversion, verbose: boolean): void {
  if (verbose) {
    detail(`Processing: ${data.inputPath}`);
    detail(`Detected ${data.format} format with ${data.recordCount} reminder(s)`);
    for (const title of data.skipped) detail(`⏭ Skipping completed task: ${title}`);
    data.rows.forEach((row, i) => detail(`✓ Converted [${i + 1}/${data.rows.length}]: ${row[Column.Name] ?? ''}`));
    printWarnings(data.warnings);
  }
  if (data.skipped.length > 0) {
    detail(`📊 ${data.rows.length} row(s), skipped ${data.skipped.length} completed task(s)`);
  }
}

export function printImportHints(): void {
  console.log();
  info('💡 Import the CSV into your project:');
  detail('1. Create or open an import project');
  detail('2. Add a Priority (Priorität) custom field to the project');
  detail('3. Import the CSV - subtasks nest under their "Parent task"');
}

export interface BatchTally {
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

export function printTally(tally: BatchTally): void {
  console.log();
  info(chalk.bold('Summary'));
  detail(`${chalk.green(`${tally.succeeded} succeeded`)}, ${chalk.red(`${tally.failed} failed`)}, ${tally.skipped} task(s) skipped`);
}

/**
 * CLI helpers: option resolution, output paths, error handling.
 */

import { basename, extname, join } from 'node:path';
import type { Command } from 'commander';
import type { ConversionOptions, Language } from '@remport/core';
import { isLanguage, resolveOptions } from '@remport/core';
import * as out from './output.js';

export const DEFAULT_OUTPUT = 'asana_import.csv';

/** Flags shared by the convert and batch commands, as commander hands them over */
export interface ConversionFlags {
  assignee?: string;
  includeCompleted?: boolean;
  language?: string;
  flatten?: boolean;
  assigneeName?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

export function addConversionOptions(cmd: Command): Command {
  return cmd
    .option('--assignee <email>', 'Assignee email for every task (env: REMPORT_ASSIGNEE)')
    .option('--include-completed', 'Include completed tasks (default: only open tasks)')
    .option('-l, --language <lang>', 'Language for column names and priority values: en, de (env: REMPORT_LANGUAGE)')
    .option('--no-flatten', 'Summarize subtasks in the parent notes instead of separate rows')
    .option('--assignee-name', 'Add an Assignee column with the name derived from the email')
    .option('--dry-run', 'Test run without writing files')
    .option('-v, --verbose', 'Verbose output');
}

/**
 * Parse a language argument. Returns null for unsupported values.
 */
export function parseLanguageArg(value: string): Language | null {
  const normalized = value.trim().toLowerCase();
  return isLanguage(normalized) ? normalized : null;
}

/**
 * Build run options from flags, falling back to environment variables.
 * Priority: flag > env > default.
 */
export function resolveCliOptions(flags: ConversionFlags, env: Env = process.env): ConversionOptions {
  const rawLanguage = flags.language ?? env['REMPORT_LANGUAGE'];
  let language: Language | undefined;
  if (rawLanguage !== undefined) {
    const parsed = parseLanguageArg(rawLanguage);
    if (parsed === null) throw new Error(`Unsupported language '${rawLanguage}'. Use en or de.`);
    language = parsed;
  }

  const assignee = flags.assignee ?? env['REMPORT_ASSIGNEE'];
  return resolveOptions({
    defaultAssigneeEmail: assignee ? assignee.trim() : undefined,
    includeCompleted: flags.includeCompleted ?? false,
    language,
    flattenSubtasks: flags.flatten ?? true,
    assigneeNameColumn: flags.assigneeName ?? false,
    dryRun: flags.dryRun ?? false,
    verbose: flags.verbose ?? false,
  });
}

/** reminders/export.json + out -> out/export.csv */
export function csvPathFor(inputPath: string, outDir: string): string {
  return join(outDir, `${basename(inputPath, extname(inputPath))}.csv`);
}

/**
 * Wrap a command action with error handling.
 * Thrown errors are printed and turn into exit code 1.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(`✗ ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}

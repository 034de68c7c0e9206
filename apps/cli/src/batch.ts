/**
 * Converts every JSON export in a directory. Files are independent:
 * one failing file is recorded and the rest still run.
 */

import { mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { BatchResult, BatchEntry, ConversionOptions, FileConversion } from '@remport/core';
import { convertFile, successCount, failureCount } from '@remport/core';
import type { BatchTally } from './output.js';
import { csvPathFor } from './helpers.js';

/** *.json files of a directory, sorted by name. Throws when the directory cannot be read. */
export function listJsonFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
    .map(entry => entry.name)
    .sort()
    .map(name => join(dir, name));
}

export function convertDirectory(
  inputDir: string,
  outDir: string,
  options: ConversionOptions,
  onFile?: (entry: BatchEntry<FileConversion>) => void,
): BatchResult<FileConversion> {
  const files = listJsonFiles(inputDir);
  if (files.length > 0 && !options.dryRun) mkdirSync(outDir, { recursive: true });

  const results: BatchEntry<FileConversion>[] = [];
  for (const file of files) {
    const entry = { file, result: convertFile(file, csvPathFor(file, outDir), options) };
    onFile?.(entry);
    results.push(entry);
  }
  return { results };
}

export function tallyBatch(batch: BatchResult<FileConversion>): BatchTally {
  let skipped = 0;
  for (const { result } of batch.results) {
    if (result.type === 'success') skipped += result.data.skipped.length;
  }
  return { succeeded: successCount(batch), failed: failureCount(batch), skipped };
}

/**
 * Runs the whole conversion: detect -> normalize -> deduplicate -> build rows -> emit.
 * Problems with a document or file come back as error results; nothing throws past here.
 */

import { readFileSync } from 'node:fs';
import type { ConversionOptions } from '../types/options.js';
import type { Column, OutputRow } from '../types/columns.js';
import type { DataResult } from '../types/results.js';
import { errorResult } from '../types/results.js';
import type { DocumentFormat } from '../detect/format-detector.js';
import { extractRecords } from '../detect/format-detector.js';
import { normalizeAll } from '../normalize/record-normalizer.js';
import { deduplicate } from '../normalize/deduplicate.js';
import { buildRows } from '../rows/row-builder.js';
import { emit, BOM } from '../emit/csv-emitter.js';

export interface Conversion {
  readonly format: Exclude<DocumentFormat, 'unknown'>;
  readonly columns: Column[];
  readonly rows: OutputRow[];
  /** Records found in the document */
  readonly recordCount: number;
  readonly duplicateCount: number;
  /** Titles of completed tasks left out */
  readonly skipped: string[];
  readonly warnings: string[];
}

export interface FileConversion extends Conversion {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly written: number;
  readonly dryRun: boolean;
}

/**
 * Deduplication runs before completion filtering, so the skip count
 * only covers distinct tasks.
 */
export function convertDocument(doc: unknown, options: ConversionOptions): DataResult<Conversion> {
  const extracted = extractRecords(doc);
  const { format } = extracted;
  if (format === 'unknown') {
    return { type: 'error', message: 'Unknown JSON format: expected a "reminders" array or a single reminder' };
  }

  const tasks = normalizeAll(extracted.records);
  const distinct = deduplicate(tasks);
  const built = buildRows(distinct, options);
  const duplicateCount = tasks.length - distinct.length;

  const warnings = [...extracted.warnings];
  if (duplicateCount > 0) warnings.push(`Removed ${duplicateCount} duplicate reminder(s)`);
  warnings.push(...built.warnings);

  return {
    type: 'success',
    message: `Converted ${built.rows.length} row(s) from ${extracted.records.length} reminder(s)`,
    data: {
      format,
      columns: built.columns,
      rows: built.rows,
      recordCount: extracted.records.length,
      duplicateCount,
      skipped: built.skipped,
      warnings,
    },
  };
}

/** Parse JSON text; a leading BOM is tolerated */
export function parseDocument(text: string): unknown {
  return JSON.parse(text.startsWith(BOM) ? text.slice(BOM.length) : text);
}

export function convertFile(inputPath: string, outputPath: string, options: ConversionOptions): DataResult<FileConversion> {
  let text: string;
  try {
    text = readFileSync(inputPath, 'utf-8');
  } catch (err: unknown) {
    return errorResult(`Cannot read ${inputPath}`, err);
  }

  let doc: unknown;
  try {
    doc = parseDocument(text);
  } catch (err: unknown) {
    return errorResult(`Invalid JSON in ${inputPath}`, err);
  }

  const converted = convertDocument(doc, options);
  if (converted.type === 'error') {
    return { type: 'error', message: `${converted.message} (${inputPath})` };
  }

  const { data } = converted;
  let written: number;
  try {
    written = emit(outputPath, data.rows, data.columns, options.dryRun);
  } catch (err: unknown) {
    return errorResult(`Cannot write ${outputPath}`, err);
  }

  const message = options.dryRun
    ? `[DRY RUN] Would write ${written} rows to ${outputPath}`
    : `Wrote ${written} rows to ${outputPath}`;
  return {
    type: 'success',
    message,
    data: { ...data, inputPath, outputPath, written, dryRun: options.dryRun },
  };
}

/**
 * Classifies parsed export documents.
 * A document is either a bulk export ({ "reminders": [...] }) or one record;
 * each record is either the legacy (capitalized keys) or the current schema.
 */

import type { SchemaVariant } from '../types/task.js';

export type JsonObject = Record<string, unknown>;

export type DocumentFormat = 'bulk' | 'single' | 'unknown';

export const BULK_KEY = 'reminders';

export interface ExtractedRecords {
  readonly format: DocumentFormat;
  readonly records: JsonObject[];
  readonly warnings: string[];
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function detectFormat(doc: unknown): DocumentFormat {
  if (!isJsonObject(doc)) return 'unknown';
  if (Array.isArray(doc[BULK_KEY])) return 'bulk';
  if (Object.hasOwn(doc, 'Title') || Object.hasOwn(doc, 'title')) return 'single';
  return 'unknown';
}

/** Must be called per record: bulk exports may mix both schemas. */
export function detectSchema(record: JsonObject): SchemaVariant {
  return Object.hasOwn(record, 'Title') ? 'legacy' : 'current';
}

/** Pull the record list out of a document; entries that are not objects are dropped. */
export function extractRecords(doc: unknown): ExtractedRecords {
  const format = detectFormat(doc);
  if (format === 'unknown' || !isJsonObject(doc)) {
    return { format: 'unknown', records: [], warnings: [] };
  }
  if (format === 'single') {
    return { format, records: [doc], warnings: [] };
  }

  const list = doc[BULK_KEY];
  const entries: unknown[] = Array.isArray(list) ? list : [];
  const records: JsonObject[] = [];
  const warnings: string[] = [];
  entries.forEach((entry, i) => {
    if (isJsonObject(entry)) {
      records.push(entry);
    } else {
      warnings.push(`Ignoring entry ${i + 1}: expected an object, got ${describe(entry)}`);
    }
  });
  return { format, records, warnings };
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}

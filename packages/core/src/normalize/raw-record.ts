/**
 * zod schemas for the two export schemas.
 * Every field falls back to a default, so parsing an object never fails.
 */

import { z } from 'zod';
import type { JsonObject } from '../detect/format-detector.js';
import { detectSchema } from '../detect/format-detector.js';

const text = z.string().catch('');

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform(items => items.filter((item): item is string => typeof item === 'string'));

export const legacyRecordSchema = z.object({
  'Title': text,
  'Notes': text,
  'List': text,
  'Due Date': text,
  'Priority': text,
  'Is Completed': z.boolean().catch(false),
});

const currentFields = {
  title: text,
  notes: text,
  list: text,
  due_date: text,
  prio: text,
  done: text,
  tags: stringList,
  flagged: text,
  has_reminder: text,
  reminder_location: text,
  url: text,
};

/** Subtasks use the current schema without further nesting */
export const subtaskRecordSchema = z.object(currentFields);

export const currentRecordSchema = z.object({
  ...currentFields,
  subtasks: z.array(z.unknown()).catch([]),
});

export type LegacyFields = z.output<typeof legacyRecordSchema>;
export type SubtaskFields = z.output<typeof subtaskRecordSchema>;
export type CurrentFields = z.output<typeof currentRecordSchema>;

export type RawRecord =
  | { readonly schema: 'legacy'; readonly fields: LegacyFields }
  | { readonly schema: 'current'; readonly fields: CurrentFields };

export function parseRawRecord(record: JsonObject): RawRecord {
  switch (detectSchema(record)) {
    case 'legacy': return { schema: 'legacy', fields: legacyRecordSchema.parse(record) };
    case 'current': return { schema: 'current', fields: currentRecordSchema.parse(record) };
  }
}

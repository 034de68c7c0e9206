import type { CanonicalTask, TaskMetadata } from '../types/task.js';
import type { JsonObject } from '../detect/format-detector.js';
import { isJsonObject } from '../detect/format-detector.js';
import type { LegacyFields, SubtaskFields, CurrentFields } from './raw-record.js';
import { parseRawRecord, subtaskRecordSchema } from './raw-record.js';

/** Yes-marker used by the current (German-locale) export */
const YES = 'Ja';

/**
 * Map one raw record, in either schema, to a canonical task.
 * Missing or mistyped fields become '', [] or false.
 */
export function normalize(record: JsonObject): CanonicalTask {
  const raw = parseRawRecord(record);
  switch (raw.schema) {
    case 'legacy': return fromLegacy(raw.fields);
    case 'current': return fromCurrent(raw.fields);
  }
}

export function normalizeAll(records: readonly JsonObject[]): CanonicalTask[] {
  return records.map(normalize);
}

function fromLegacy(fields: LegacyFields): CanonicalTask {
  return {
    schema: 'legacy',
    title: fields['Title'],
    notes: fields['Notes'],
    section: fields['List'],
    dueDate: fields['Due Date'],
    priority: fields['Priority'],
    completed: fields['Is Completed'],
    tags: [],
    subtasks: [],
    metadata: null,
  };
}

function fromCurrent(fields: CurrentFields): CanonicalTask {
  const subtasks = fields.subtasks
    .filter(isJsonObject)
    .map(entry => fromSubtask(subtaskRecordSchema.parse(entry)));
  return { ...fromSubtask(fields), subtasks };
}

function fromSubtask(fields: SubtaskFields): CanonicalTask {
  return {
    schema: 'current',
    title: fields.title,
    notes: fields.notes,
    section: fields.list,
    dueDate: fields.due_date,
    priority: fields.prio,
    completed: fields.done === YES,
    tags: fields.tags,
    subtasks: [],
    metadata: toMetadata(fields),
  };
}

function toMetadata(fields: SubtaskFields): TaskMetadata {
  return {
    flagged: fields.flagged === YES,
    hasReminder: fields.has_reminder === YES,
    location: fields.reminder_location,
    url: fields.url,
  };
}

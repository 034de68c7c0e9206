/**
 * Turns canonical tasks into CSV rows for one run.
 * Every row carries exactly the columns from getColumns(options).
 */

import type { ConversionOptions } from '../types/options.js';
import type { CanonicalTask } from '../types/task.js';
import type { OutputRow } from '../types/columns.js';
import { Column } from '../types/columns.js';
import { extractTags, mergeTags } from '../parsers/hashtag-parser.js';
import { formatDate } from '../parsers/date-formatter.js';
import { mapPriority, isKnownPriority } from '../parsers/priority-parser.js';
import { deriveAssigneeName } from './assignee.js';
import { formatSection } from './section.js';
import { metadataLines, subtaskSummaryLines, appendBlock } from './notes.js';
import { getColumns } from './columns.js';

export const UNTITLED_SUBTASK = 'Untitled Subtask';

export interface RowBuildResult {
  readonly columns: Column[];
  readonly rows: OutputRow[];
  /** Titles of completed tasks left out of the output */
  readonly skipped: string[];
  readonly warnings: string[];
}

/** Every value a row can carry, before it is cut down to the active columns */
interface RowFields {
  readonly name: string;
  readonly assignee: string;
  readonly assigneeEmail: string;
  readonly dueDate: string;
  readonly tags: string;
  readonly notes: string;
  readonly section: string;
  readonly parentTask: string;
  readonly priority: string;
}

const COLUMN_FIELD: Record<Column, keyof RowFields> = {
  [Column.Name]: 'name',
  [Column.Assignee]: 'assignee',
  [Column.AssigneeEmail]: 'assigneeEmail',
  [Column.DueDate]: 'dueDate',
  [Column.Tags]: 'tags',
  [Column.Notes]: 'notes',
  [Column.Section]: 'section',
  [Column.ParentTask]: 'parentTask',
  [Column.Priority]: 'priority',
  [Column.PriorityDe]: 'priority',
};

/**
 * The only place rows are built. Each row gets exactly the given columns, in order,
 * with '' for fields that do not apply; OutputRow's type alone does not promise that.
 */
function toOutputRow(fields: RowFields, columns: readonly Column[]): OutputRow {
  const row: Partial<Record<Column, string>> = {};
  for (const column of columns) {
    row[column] = fields[COLUMN_FIELD[column]];
  }
  return row;
}

/** Clean title, or the original when the title held nothing but tags */
export function displayName(task: CanonicalTask): string {
  return extractTags(task.title).cleanTitle || task.title;
}

function subtaskName(task: CanonicalTask): string {
  return displayName(task) || UNTITLED_SUBTASK;
}

export function buildRows(tasks: readonly CanonicalTask[], options: ConversionOptions): RowBuildResult {
  const columns = getColumns(options);
  const rows: OutputRow[] = [];
  const skipped: string[] = [];
  const warnings: string[] = [];

  const assigneeEmail = options.defaultAssigneeEmail ?? '';
  const assignee = deriveAssigneeName(assigneeEmail);

  const fieldsFor = (
    task: CanonicalTask,
    name: string,
    section: string,
    parentTask: string,
    noteBlocks: readonly string[][],
  ): RowFields => {
    const label = name || '(untitled)';
    if (!isKnownPriority(task.priority)) {
      warnings.push(`Unknown priority '${task.priority}' on '${label}', leaving it empty`);
    }
    const { tags: hashtags } = extractTags(task.title);
    return {
      name,
      assignee,
      assigneeEmail,
      dueDate: formatDate(task.dueDate, message => warnings.push(`${message} on '${label}'`)),
      tags: mergeTags(hashtags, task.tags).join(', '),
      notes: noteBlocks.reduce(appendBlock, task.notes),
      section,
      parentTask,
      priority: mapPriority(task.priority, options.language),
    };
  };

  for (const task of tasks) {
    if (task.completed && !options.includeCompleted) {
      skipped.push(task.title);
      continue;
    }

    const name = displayName(task);
    const noteBlocks = [metadataLines(task.metadata, task.subtasks.length)];
    if (!options.flattenSubtasks) {
      noteBlocks.push(subtaskSummaryLines(task.subtasks, subtaskName));
    }
    rows.push(toOutputRow(fieldsFor(task, name, formatSection(task.section), '', noteBlocks), columns));

    if (!options.flattenSubtasks) continue;
    for (const subtask of task.subtasks) {
      const subtaskBlocks = [metadataLines(subtask.metadata, 0)];
      rows.push(toOutputRow(fieldsFor(subtask, subtaskName(subtask), '', name, subtaskBlocks), columns));
    }
  }

  return { columns, rows, skipped, warnings };
}

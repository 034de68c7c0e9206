import type { ConversionOptions } from '../types/options.js';
import { Column, PriorityColumn } from '../types/columns.js';

/**
 * Header for a run. Order:
 * Name, [Assignee], Assignee Email, Due Date, Tags, Notes, Section/Column, [Parent task], Priority
 */
export function getColumns(
  options: Pick<ConversionOptions, 'language' | 'flattenSubtasks' | 'assigneeNameColumn'>,
): Column[] {
  const columns: Column[] = [Column.Name];
  if (options.assigneeNameColumn) columns.push(Column.Assignee);
  columns.push(Column.AssigneeEmail, Column.DueDate, Column.Tags, Column.Notes, Column.Section);
  if (options.flattenSubtasks) columns.push(Column.ParentTask);
  columns.push(PriorityColumn[options.language]);
  return columns;
}

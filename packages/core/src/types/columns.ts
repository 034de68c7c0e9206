import type { Language } from './options.js';

export const Column = {
  Name: 'Name',
  Assignee: 'Assignee',
  AssigneeEmail: 'Assignee Email',
  DueDate: 'Due Date',
  Tags: 'Tags',
  Notes: 'Notes',
  Section: 'Section/Column',
  ParentTask: 'Parent task',
  Priority: 'Priority',
  PriorityDe: 'Priorität',
} as const;

export type Column = (typeof Column)[keyof typeof Column];

export const PriorityColumn: Record<Language, Column> = {
  en: Column.Priority,
  de: Column.PriorityDe,
};

/** One CSV line keyed by header name; carries exactly the active columns */
export type OutputRow = Readonly<Partial<Record<Column, string>>>;

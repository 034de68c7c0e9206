import type { CanonicalTask, TaskMetadata } from '../types/task.js';

export const MetadataMarker = {
  Flagged: '⭐',
  Reminder: '🔔',
  Location: '📍',
  Url: '🔗',
  Subtasks: '📝',
} as const;

/** Human-readable metadata lines, in fixed order: flag, reminder, location, url, subtask count */
export function metadataLines(metadata: TaskMetadata | null, subtaskCount: number): string[] {
  const lines: string[] = [];
  if (metadata?.flagged) lines.push(`${MetadataMarker.Flagged} Flagged`);
  if (metadata?.hasReminder) lines.push(`${MetadataMarker.Reminder} Has Reminder`);
  if (metadata?.location) lines.push(`${MetadataMarker.Location} Location: ${metadata.location}`);
  if (metadata?.url) lines.push(`${MetadataMarker.Url} URL: ${metadata.url}`);
  if (subtaskCount > 0) lines.push(`${MetadataMarker.Subtasks} ${subtaskCount} subtasks`);
  return lines;
}

/** Inline checklist used when subtasks are not exported as their own rows */
export function subtaskSummaryLines(subtasks: readonly CanonicalTask[], nameOf: (task: CanonicalTask) => string): string[] {
  if (subtasks.length === 0) return [];
  return ['Subtasks:', ...subtasks.map(s => `- [${s.completed ? 'x' : ' '}] ${nameOf(s)}`)];
}

/** Append a block of lines to notes, separated from existing text by a blank line */
export function appendBlock(notes: string, lines: readonly string[]): string {
  if (lines.length === 0) return notes;
  const block = lines.join('\n');
  return notes ? `${notes}\n\n${block}` : block;
}

import type { CanonicalTask } from '../types/task.js';

/** Identity of a task for duplicate detection; priority, tags and completion are ignored */
export function duplicateKey(task: CanonicalTask): string {
  return JSON.stringify([task.title, task.notes, task.section, task.dueDate]);
}

/**
 * Drop tasks whose (title, notes, section, due date) matches an earlier task.
 * Runs on canonical values, so a legacy and a current record with the same content collide.
 */
export function deduplicate(tasks: readonly CanonicalTask[]): CanonicalTask[] {
  const seen = new Set<string>();
  const survivors: CanonicalTask[] = [];
  for (const task of tasks) {
    const key = duplicateKey(task);
    if (seen.has(key)) continue;
    seen.add(key);
    survivors.push(task);
  }
  return survivors;
}

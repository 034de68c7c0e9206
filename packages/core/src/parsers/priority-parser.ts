import type { Language } from '../types/options.js';
import { Priority, PriorityName } from '../types/priority.js';

/**
 * Source vocabulary of both export languages.
 * null means "no priority" and becomes an empty cell.
 */
const SOURCE_PRIORITY: ReadonlyMap<string, Priority | null> = new Map<string, Priority | null>([
  ['', null],
  ['Ohne', null],
  ['None', null],
  ['Gering', Priority.Low],
  ['Niedrig', Priority.Low],
  ['Low', Priority.Low],
  ['Mittel', Priority.Medium],
  ['Medium', Priority.Medium],
  ['Hoch', Priority.High],
  ['High', Priority.High],
]);

/** Resolve an exported priority; anything outside the vocabulary counts as none. */
export function parsePriority(raw: string): Priority | null {
  return SOURCE_PRIORITY.get(raw.trim()) ?? null;
}

/** Exported priority to the target label in the given language, '' when none or unknown. */
export function mapPriority(raw: string, language: Language = 'en'): string {
  const priority = parsePriority(raw);
  return priority === null ? '' : PriorityName[language][priority];
}

export function isKnownPriority(raw: string): boolean {
  return SOURCE_PRIORITY.has(raw.trim());
}

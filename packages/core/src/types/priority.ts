import type { Language } from './options.js';

export const Priority = {
  Low: 'low',
  Medium: 'medium',
  High: 'high',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Target labels per output language */
export const PriorityName: Record<Language, Record<Priority, string>> = {
  en: {
    [Priority.Low]: 'Low',
    [Priority.Medium]: 'Medium',
    [Priority.High]: 'High',
  },
  de: {
    [Priority.Low]: 'Niedrig',
    [Priority.Medium]: 'Mittel',
    [Priority.High]: 'Hoch',
  },
};

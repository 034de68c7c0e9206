import { format, isValid, parseISO } from 'date-fns';

// Extended (2025-03-15) or basic (20250315) calendar date at the start
const CALENDAR_DATE_RE = /^(\d{4})-?(\d{2})-?(\d{2})/;
const OUTPUT_FORMAT = 'MM/dd/yyyy';

export type WarningSink = (message: string) => void;

/**
 * Format an ISO-8601 timestamp ("2025-03-15T09:00:00Z", "...+01:00", "2025-03-15", "20250315")
 * as MM/DD/YYYY. The calendar date is taken as written; the offset never moves it
 * to another day. Empty input gives ''; unparseable input gives '' and a warning.
 */
export function formatDate(value: string, onWarning?: WarningSink): string {
  const input = value.trim();
  if (!input) return '';

  const match = CALENDAR_DATE_RE.exec(input);
  if (!match || !isValid(parseISO(input))) {
    onWarning?.(`Could not convert date '${value}'`);
    return '';
  }

  // Date-only strings parse as local midnight, so formatting keeps the written day
  const [, year, month, day] = match;
  return format(parseISO(`${year}-${month}-${day}`), OUTPUT_FORMAT);
}

/**
 * Calendar keys for grouping sessions. Session dates are MM/DD/YYYY strings;
 * anything else yields null and is left out of date-based checks.
 */

const SESSION_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function parseSessionDate(value: string): CalendarDate | null {
  const match = SESSION_DATE.exec(value.trim());
  if (!match) return null;

  const month = parseInt(match[1], 10);
  const day = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

/**
 * ISO-8601 week key `YYYY-Www`, using the ISO week-numbering year.
 */
export function isoWeekKey(date: CalendarDate): string {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day));
  const dayOfWeek = d.getUTCDay() || 7;
  // The Thursday of this week decides the ISO year
  d.setUTCDate(d.getUTCDate() + 4 - dayOfWeek);
  const isoYear = d.getUTCFullYear();
  const yearStart = Date.UTC(isoYear, 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / 86400000 + 1) / 7);
  return `${isoYear}-W${String(week).padStart(2, '0')}`;
}

export function monthKey(date: CalendarDate): string {
  return `${date.year}-${String(date.month).padStart(2, '0')}`;
}

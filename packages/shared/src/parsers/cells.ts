/**
 * Spreadsheet Cell Parsing
 *
 * Cells arrive from SheetJS as strings, numbers (dates and times are
 * serials), booleans, Date objects or null. Each parser returns a tagged
 * outcome: 'parsed' with the canonical form, or 'raw' with the cell text
 * when no known format matched.
 */

import * as XLSX from 'xlsx';

export type ParseOutcome<T> = { kind: 'parsed'; value: T } | { kind: 'raw'; value: string };

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function isEmptyCell(value: unknown): boolean {
  return cellText(value) === '';
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function formatDate(year: number, month: number, day: number): string {
  return `${pad2(month)}/${pad2(day)}/${String(year).padStart(4, '0')}`;
}

const DATE_FORMATS: Array<{ pattern: RegExp; order: ['y' | 'm' | 'd', 'y' | 'm' | 'd', 'y' | 'm' | 'd'] }> = [
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ['m', 'd', 'y'] },
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ['y', 'm', 'd'] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: ['d', 'm', 'y'] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: ['m', 'd', 'y'] },
];

/**
 * Parse a date cell to MM/DD/YYYY.
 *
 * Strings are tried as M/D/YYYY, YYYY-M-D, D-M-YYYY then M-D-YYYY; the first
 * format that yields a real calendar date wins.
 */
export function parseDateCell(value: unknown): ParseOutcome<string> {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return {
      kind: 'parsed',
      value: formatDate(value.getFullYear(), value.getMonth() + 1, value.getDate()),
    };
  }

  if (typeof value === 'number' && value > 0) {
    const parts = XLSX.SSF.parse_date_code(value);
    if (parts && parts.y && parts.m && parts.d) {
      return { kind: 'parsed', value: formatDate(parts.y, parts.m, parts.d) };
    }
  }

  const text = cellText(value);
  for (const { pattern, order } of DATE_FORMATS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const fields = { y: 0, m: 0, d: 0 };
    order.forEach((key, i) => {
      fields[key] = parseInt(match[i + 1], 10);
    });
    if (isValidDate(fields.y, fields.m, fields.d)) {
      return { kind: 'parsed', value: formatDate(fields.y, fields.m, fields.d) };
    }
  }

  return { kind: 'raw', value: text };
}

function formatTime(hours24: number, minutes: number): string {
  const suffix = hours24 < 12 ? 'AM' : 'PM';
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  return `${pad2(hours12)}:${pad2(minutes)} ${suffix}`;
}

const TWELVE_HOUR = /^(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/;
const TWENTY_FOUR_HOUR = /^(\d{1,2}):(\d{2})$/;

/**
 * Parse a clock time in 12-hour `h:mm AM` form to minutes past midnight.
 * Returns null for anything else.
 */
export function parseClockTime(text: string): number | null {
  const match = TWELVE_HOUR.exec(text.trim());
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours < 1 || hours > 12 || minutes > 59) return null;

  const pm = match[3].toUpperCase() === 'PM';
  return ((hours % 12) + (pm ? 12 : 0)) * 60 + minutes;
}

/**
 * Parse a time cell to `hh:mm AM`.
 *
 * Accepts `h:mm AM`, `h:mmAM`, 24-hour `HH:mm`, Date objects and day
 * fractions (the time part of a serial).
 */
export function parseTimeCell(value: unknown): ParseOutcome<string> {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return { kind: 'parsed', value: formatTime(value.getHours(), value.getMinutes()) };
  }

  if (typeof value === 'number' && value >= 0) {
    const parts = XLSX.SSF.parse_date_code(value);
    if (parts) {
      return { kind: 'parsed', value: formatTime(parts.H, parts.M) };
    }
  }

  const text = cellText(value);

  const minutes = parseClockTime(text);
  if (minutes !== null) {
    return { kind: 'parsed', value: formatTime(Math.floor(minutes / 60), minutes % 60) };
  }

  const match = TWENTY_FOUR_HOUR.exec(text);
  if (match) {
    const hours = parseInt(match[1], 10);
    const mins = parseInt(match[2], 10);
    if (hours <= 23 && mins <= 59) {
      return { kind: 'parsed', value: formatTime(hours, mins) };
    }
  }

  return { kind: 'raw', value: text };
}

const NO_SHOW_WORDS = new Set(['yes', 'y', 'true', '1']);

export function isTruthyNoShow(value: unknown): boolean {
  if (value === true) return true;
  if (typeof value === 'number') return value === 1;
  if (typeof value === 'string') return NO_SHOW_WORDS.has(value.trim().toLowerCase());
  return false;
}

/**
 * Parse a session-hours cell. Empty cells are 0; anything that is not a
 * non-negative number is reported as raw.
 */
export function parseHoursCell(value: unknown): ParseOutcome<number> {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0
      ? { kind: 'parsed', value }
      : { kind: 'raw', value: String(value) };
  }

  const text = cellText(value);
  if (text === '') return { kind: 'parsed', value: 0 };
  if (/^\d*\.?\d+$/.test(text)) return { kind: 'parsed', value: parseFloat(text) };
  return { kind: 'raw', value: text };
}

/**
 * Feedback Parser
 *
 * Reads a feedback workbook: the first sheet is the student roster, every
 * other sheet is one student's session log named after the student. Header
 * names vary, so columns are found through the synonym tables in ./columns.
 * Nothing here throws on odd data; unparseable cells are kept raw and
 * reported in `warnings`.
 */

import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import type {
  FeedbackExtraction,
  ParsedFeedback,
  SessionRecord,
  StudentRecord,
  StudentStatus,
} from '../types';
import {
  NO_SHOW_MARKERS,
  OVERVIEW_COLUMNS,
  OVERVIEW_SHEET_ALIASES,
  SESSION_COLUMNS,
  matchingColumns,
  normalizeHeader,
  resolveColumn,
} from './columns';
import {
  cellText,
  isEmptyCell,
  isTruthyNoShow,
  parseDateCell,
  parseHoursCell,
  parseTimeCell,
} from './cells';
import { studentIdFor } from './student-id';
import { NotFoundError } from '../errors';
import { logger } from '../logger';

type Row = unknown[];

interface NumberedRow {
  row: Row;
  /** 1-based, as shown in the spreadsheet */
  rowNumber: number;
}

const STATUS_BY_COLOR: Record<string, StudentStatus> = {
  green: 'active',
  red: 'terminated',
  yellow: 'initial_call',
  orange: 'assign_tutor',
  pink: 'on_hold',
  blue: 'language_request',
};

/**
 * Non-blank rows with their sheet row numbers; the first one is the header.
 */
function sheetRows(sheet: XLSX.WorkSheet): NumberedRow[] {
  const rows = XLSX.utils.sheet_to_json<Row>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: true,
  });
  const ref = sheet['!ref'];
  const firstRow = ref ? XLSX.utils.decode_range(ref).s.r + 1 : 1;

  return rows
    .map((row, i) => ({ row, rowNumber: firstRow + i }))
    .filter(({ row }) => !row.every(isEmptyCell));
}

function cellAt(row: Row, index: number): unknown {
  return index >= 0 && index < row.length ? row[index] : null;
}

function textAt(row: Row, index: number): string {
  return cellText(cellAt(row, index));
}

export function statusFromColor(value: unknown): StudentStatus {
  return STATUS_BY_COLOR[cellText(value).toLowerCase()] ?? 'unknown';
}

/**
 * First non-empty value among the headers containing a synonym, trying
 * synonyms in order.
 */
function firstValueFor(row: Row, headers: readonly string[], synonyms: readonly string[]): unknown {
  for (const synonym of synonyms) {
    for (let i = 0; i < headers.length; i++) {
      if (headers[i].includes(synonym) && !isEmptyCell(cellAt(row, i))) {
        return cellAt(row, i);
      }
    }
  }
  return null;
}

function splitName(fullName: string): { first_name: string; last_name: string } {
  const space = fullName.indexOf(' ');
  if (space === -1) return { first_name: fullName, last_name: '' };
  return { first_name: fullName.slice(0, space), last_name: fullName.slice(space + 1).trim() };
}

export function parseOverviewSheet(sheet: XLSX.WorkSheet, warnings: string[]): StudentRecord[] {
  const [header, ...rows] = sheetRows(sheet);
  if (!header) {
    warnings.push('Overview sheet is empty');
    return [];
  }

  const headers = header.row.map(normalizeHeader);
  const col = {
    studentName: resolveColumn(headers, OVERVIEW_COLUMNS.studentName),
    grade: resolveColumn(headers, OVERVIEW_COLUMNS.grade),
    subjects: resolveColumn(headers, OVERVIEW_COLUMNS.subjects),
    caregiverName: resolveColumn(headers, OVERVIEW_COLUMNS.caregiverName),
    caregiverPhone: resolveColumn(headers, OVERVIEW_COLUMNS.caregiverPhone),
    caregiverEmail: resolveColumn(headers, OVERVIEW_COLUMNS.caregiverEmail),
    tutor: resolveColumn(headers, OVERVIEW_COLUMNS.tutor),
    color: resolveColumn(headers, OVERVIEW_COLUMNS.color),
  };

  if (col.studentName === -1) {
    warnings.push('Overview sheet has no student name column');
    return [];
  }

  const students: StudentRecord[] = [];
  for (const { row } of rows) {
    const fullName = textAt(row, col.studentName);
    if (fullName === '') continue;

    const startDate = firstValueFor(row, headers, OVERVIEW_COLUMNS.startDate);

    students.push({
      id: studentIdFor(fullName),
      ...splitName(fullName),
      full_name: fullName,
      grade: textAt(row, col.grade),
      subjects: textAt(row, col.subjects),
      caregiver_name: textAt(row, col.caregiverName),
      caregiver_phone: textAt(row, col.caregiverPhone),
      caregiver_email: textAt(row, col.caregiverEmail),
      tutor_assigned: textAt(row, col.tutor),
      status: statusFromColor(cellAt(row, col.color)),
      case_number: cellText(firstValueFor(row, headers, OVERVIEW_COLUMNS.caseNumber)),
      tutor_start_date: isEmptyCell(startDate) ? '' : parseDateCell(startDate).value,
    });
  }

  return students;
}

export function parseSessionSheet(
  sheet: XLSX.WorkSheet,
  studentName: string,
  warnings: string[]
): SessionRecord[] {
  const [header, ...rows] = sheetRows(sheet);
  if (!header) return [];

  const headers = header.row.map(normalizeHeader);
  const col = {
    date: resolveColumn(headers, SESSION_COLUMNS.date),
    timeIn: resolveColumn(headers, SESSION_COLUMNS.timeIn),
    timeOut: resolveColumn(headers, SESSION_COLUMNS.timeOut),
    hours: resolveColumn(headers, SESSION_COLUMNS.hours),
    goal: resolveColumn(headers, SESSION_COLUMNS.goal),
  };
  const noShowColumns = matchingColumns(headers, NO_SHOW_MARKERS);

  const missing = (['date', 'timeIn', 'timeOut', 'hours'] as const).filter((f) => col[f] === -1);
  if (missing.length > 0) {
    warnings.push(`Sheet "${studentName}": missing ${missing.join(', ')} column(s); no sessions read`);
    return [];
  }

  const studentId = studentIdFor(studentName);
  const sessions: SessionRecord[] = [];

  rows.forEach(({ row, rowNumber }) => {
    const dateCell = cellAt(row, col.date);
    if (isEmptyCell(dateCell)) return;

    const rowLabel = `Sheet "${studentName}" row ${rowNumber}`;

    const date = parseDateCell(dateCell);
    if (date.kind === 'raw') warnings.push(`${rowLabel}: unrecognized date "${date.value}"`);

    const timeInCell = cellAt(row, col.timeIn);
    const timeOutCell = cellAt(row, col.timeOut);
    const timeIn = isEmptyCell(timeInCell) ? null : parseTimeCell(timeInCell);
    const timeOut = isEmptyCell(timeOutCell) ? null : parseTimeCell(timeOutCell);
    for (const time of [timeIn, timeOut]) {
      if (time?.kind === 'raw') warnings.push(`${rowLabel}: unrecognized time "${time.value}"`);
    }

    const hours = parseHoursCell(cellAt(row, col.hours));
    if (hours.kind === 'raw') warnings.push(`${rowLabel}: unrecognized hours "${hours.value}", using 0`);

    sessions.push({
      student_id: studentId,
      student_name: studentName,
      date: date.value,
      time_in: timeIn?.value ?? '',
      time_out: timeOut?.value ?? '',
      hours: hours.kind === 'parsed' ? hours.value : 0,
      goal: col.goal === -1 ? '' : textAt(row, col.goal),
      is_no_show: noShowColumns.some((c) => isTruthyNoShow(cellAt(row, c))),
    });
  });

  return sessions;
}

export function isOverviewAlias(sheetName: string): boolean {
  const lower = sheetName.trim().toLowerCase();
  return OVERVIEW_SHEET_ALIASES.some((alias) => alias === lower);
}

export function parseFeedback(workbook: XLSX.WorkBook): ParsedFeedback {
  const warnings: string[] = [];
  if (workbook.SheetNames.length === 0) {
    return { students: [], sessions: [], warnings: ['Workbook has no sheets'] };
  }
  const [overviewName, ...sheetNames] = workbook.SheetNames;

  const students = parseOverviewSheet(workbook.Sheets[overviewName], warnings);

  const sessions: SessionRecord[] = [];
  for (const sheetName of sheetNames) {
    if (isOverviewAlias(sheetName)) continue;
    sessions.push(...parseSessionSheet(workbook.Sheets[sheetName], sheetName.trim(), warnings));
  }

  const knownIds = new Set(students.map((s) => s.id));
  const orphanSheets = new Set(
    sessions.filter((s) => !knownIds.has(s.student_id)).map((s) => s.student_name)
  );
  for (const name of orphanSheets) {
    warnings.push(`Sheet "${name}" does not match any student on the overview sheet`);
  }

  return { students, sessions, warnings };
}

export function readWorkbook(filePath: string): XLSX.WorkBook {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`Workbook not found: ${filePath}`);
  }
  return XLSX.readFile(filePath);
}

/**
 * Read a feedback workbook from disk and wrap the result in an envelope.
 */
export function extractFeedback(
  filePath: string,
  read: (filePath: string) => XLSX.WorkBook = readWorkbook
): FeedbackExtraction {
  const parsed = parseFeedback(read(filePath));

  logger.info('Feedback parsed', {
    source_file: path.basename(filePath),
    students: parsed.students.length,
    sessions: parsed.sessions.length,
    warnings: parsed.warnings.length,
  });

  return {
    ...parsed,
    source_file: path.basename(filePath),
    extraction_date: new Date().toISOString(),
  };
}

/**
 * Column Synonym Tables
 *
 * Feedback workbooks are hand-maintained, so headers drift between months.
 * Synonyms are tried in order, canonical name first; a field resolves to the
 * first header (in column order) containing that synonym after normalization.
 */

export const OVERVIEW_COLUMNS = {
  studentName: ['student_name', 'student'],
  grade: ['grade'],
  subjects: ['subjects', 'subject'],
  caregiverName: ['caretaker_name', 'caregiver_name'],
  caregiverPhone: ['phone_number', 'phone'],
  caregiverEmail: ['email_address', 'email'],
  tutor: ['tutor_assigned', 'assigned_tutor', 'tutor_name'],
  color: ['color_code', 'colour_code', 'color'],
  caseNumber: ['case_number', 'case_#', 'case_no', 'case_num', 'case'],
  startDate: ['start_date', 'tutor_start_date', 'tutoring_start'],
} as const;

export const SESSION_COLUMNS = {
  date: ['date'],
  timeIn: ['time_in', 'clock_in'],
  timeOut: ['time_out', 'clock_out'],
  hours: ['hours', 'duration'],
  goal: ['goal', 'objective', 'notes'],
} as const;

/** Every column whose header contains one of these marks a no-show */
export const NO_SHOW_MARKERS = ['no_show', 'noshow'] as const;

/** Sheet names that hold the roster rather than a student's log */
export const OVERVIEW_SHEET_ALIASES = ['sheet1', 'overview', 'main'] as const;

export type OverviewField = keyof typeof OVERVIEW_COLUMNS;
export type SessionField = keyof typeof SESSION_COLUMNS;

export function normalizeHeader(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim().toLowerCase().replace(/ /g, '_');
}

/**
 * Index of the first header containing the earliest matching synonym, or -1.
 */
export function resolveColumn(headers: readonly string[], synonyms: readonly string[]): number {
  for (const synonym of synonyms) {
    const index = headers.findIndex((header) => header.includes(synonym));
    if (index !== -1) return index;
  }
  return -1;
}

/**
 * Indexes of every header containing any marker.
 */
export function matchingColumns(headers: readonly string[], markers: readonly string[]): number[] {
  const indexes: number[] = [];
  headers.forEach((header, i) => {
    if (markers.some((m) => header.includes(m))) indexes.push(i);
  });
  return indexes;
}


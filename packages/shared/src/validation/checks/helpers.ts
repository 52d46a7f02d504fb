import type { SessionRecord } from '../../types';

/** Hours are compared and reported at 2 decimal places. */
export function roundHours(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Name of the first session seen for each student id */
export function firstNameById(sessions: SessionRecord[]): Map<string, string> {
  const names = new Map<string, string>();
  for (const s of sessions) {
    if (!names.has(s.student_id)) names.set(s.student_id, s.student_name);
  }
  return names;
}

import type { ParsedFeedback, ValidationIssue } from '../../types';
import type { ValidationRules } from '../rules';
import { createIssue } from '../severity';
import { monthKey, parseSessionDate } from '../calendar';
import { firstNameById } from './helpers';

/**
 * Per-student monthly no-show counts against the monthly cap.
 */
export function checkNoShows(feedback: ParsedFeedback, rules: ValidationRules): ValidationIssue[] {
  const byStudent = new Map<string, Map<string, string[]>>();

  for (const session of feedback.sessions) {
    if (!session.is_no_show || session.student_id === '') continue;
    const date = parseSessionDate(session.date);
    if (!date) continue;

    const months = byStudent.get(session.student_id) ?? new Map<string, string[]>();
    byStudent.set(session.student_id, months);

    const month = monthKey(date);
    const dates = months.get(month) ?? [];
    months.set(month, dates);
    dates.push(session.date);
  }

  const names = firstNameById(feedback.sessions);
  const issues: ValidationIssue[] = [];

  for (const [studentId, months] of byStudent) {
    const studentName = names.get(studentId) ?? 'Unknown Student';
    for (const [month, dates] of months) {
      if (dates.length <= rules.maxMonthlyNoShows) continue;

      issues.push(
        createIssue(
          'excess_no_shows',
          'medium',
          `Student ${studentName} has ${dates.length} no-shows in month ${month}`,
          {
            student_id: studentId,
            student_name: studentName,
            month,
            no_show_count: dates.length,
            excess_count: dates.length - rules.maxMonthlyNoShows,
            no_show_dates: dates,
          }
        )
      );
    }
  }

  return issues;
}

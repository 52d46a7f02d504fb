import type { ParsedFeedback, ValidationIssue } from '../../types';
import type { ValidationRules } from '../rules';
import { createIssue } from '../severity';
import { isoWeekKey, parseSessionDate } from '../calendar';
import { firstNameById, roundHours } from './helpers';

interface WeekBucket {
  hours: number;
  sessions: Array<{ date: string; hours: number }>;
}

/**
 * Per-student ISO-week totals of attended sessions against the weekly cap.
 * Sessions whose date did not parse are left out.
 */
export function checkWeeklyHours(feedback: ParsedFeedback, rules: ValidationRules): ValidationIssue[] {
  const byStudent = new Map<string, Map<string, WeekBucket>>();

  for (const session of feedback.sessions) {
    if (session.is_no_show || session.student_id === '') continue;
    const date = parseSessionDate(session.date);
    if (!date) continue;

    const weeks = byStudent.get(session.student_id) ?? new Map<string, WeekBucket>();
    byStudent.set(session.student_id, weeks);

    const week = isoWeekKey(date);
    const bucket = weeks.get(week) ?? { hours: 0, sessions: [] };
    weeks.set(week, bucket);

    bucket.hours += session.hours;
    bucket.sessions.push({ date: session.date, hours: session.hours });
  }

  const names = firstNameById(feedback.sessions);
  const issues: ValidationIssue[] = [];

  for (const [studentId, weeks] of byStudent) {
    const studentName = names.get(studentId) ?? 'Unknown Student';
    for (const [week, bucket] of weeks) {
      const total = roundHours(bucket.hours);
      if (total <= rules.maxWeeklyHours) continue;

      issues.push(
        createIssue(
          'excess_weekly_hours',
          'high',
          `Student ${studentName} exceeds ${rules.maxWeeklyHours} hours in week ${week}`,
          {
            student_id: studentId,
            student_name: studentName,
            week,
            total_hours: total,
            excess_hours: roundHours(total - rules.maxWeeklyHours),
            sessions: bucket.sessions,
          }
        )
      );
    }
  }

  return issues;
}

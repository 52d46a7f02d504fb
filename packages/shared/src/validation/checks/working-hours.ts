import type { ParsedFeedback, ValidationIssue } from '../../types';
import type { ValidationRules } from '../rules';
import { createIssue } from '../severity';
import { parseClockTime } from '../../parsers/cells';

function formatMinutes(minutes: number): string {
  const hours24 = Math.floor(minutes / 60);
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  return `${hours12}:${String(minutes % 60).padStart(2, '0')} ${hours24 < 12 ? 'AM' : 'PM'}`;
}

/**
 * Sessions must start no earlier than the window opens and end no later than
 * it closes. No-shows and sessions missing either time are skipped.
 */
export function checkWorkingHours(feedback: ParsedFeedback, rules: ValidationRules): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const opens = formatMinutes(rules.earliestStartMinutes);
  const closes = formatMinutes(rules.latestEndMinutes);

  for (const session of feedback.sessions) {
    if (session.is_no_show) continue;
    if (session.time_in === '' || session.time_out === '') continue;

    const details = {
      student_name: session.student_name,
      date: session.date,
      time_in: session.time_in,
      time_out: session.time_out,
    };

    const timeIn = parseClockTime(session.time_in);
    const timeOut = parseClockTime(session.time_out);
    if (timeIn === null || timeOut === null) {
      issues.push(
        createIssue('unparseable_time', 'low', `Unable to parse time for ${session.student_name}`, {
          ...details,
          error: `Expected h:mm AM/PM, got "${timeIn === null ? session.time_in : session.time_out}"`,
        })
      );
      continue;
    }

    if (timeIn < rules.earliestStartMinutes) {
      issues.push(
        createIssue(
          'invalid_start_time',
          'medium',
          `Session for ${session.student_name} starts before ${opens}`,
          details
        )
      );
    }

    if (timeOut > rules.latestEndMinutes) {
      issues.push(
        createIssue(
          'invalid_end_time',
          'medium',
          `Session for ${session.student_name} ends after ${closes}`,
          details
        )
      );
    }
  }

  return issues;
}

/**
 * Payroll vs feedback hours, per tutor.
 *
 * Feedback tutors are the trimmed `tutor_assigned` values on the roster; a
 * tutor's feedback hours are the hours of every session of their students,
 * no-shows included, linked by student id. Names match exactly after trimming.
 */

import type { ParsedFeedback, ParsedPayroll, ValidationIssue } from '../../types';
import type { ValidationRules } from '../rules';
import { createIssue } from '../severity';
import { roundHours } from './helpers';

interface FeedbackTutor {
  students: string[];
  hours: number;
}

function collectFeedbackTutors(feedback: ParsedFeedback): Map<string, FeedbackTutor> {
  const tutors = new Map<string, FeedbackTutor>();
  const tutorByStudentId = new Map<string, string>();

  for (const student of feedback.students) {
    const tutorName = student.tutor_assigned.trim();
    if (tutorName === '') continue;

    const entry = tutors.get(tutorName) ?? { students: [], hours: 0 };
    entry.students.push(student.full_name);
    tutors.set(tutorName, entry);
    if (!tutorByStudentId.has(student.id)) tutorByStudentId.set(student.id, tutorName);
  }

  for (const session of feedback.sessions) {
    const tutorName = tutorByStudentId.get(session.student_id);
    const entry = tutorName === undefined ? undefined : tutors.get(tutorName);
    if (entry) entry.hours += session.hours;
  }

  return tutors;
}

export function checkTutorHours(
  payroll: ParsedPayroll,
  feedback: ParsedFeedback,
  rules: ValidationRules
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const feedbackTutors = collectFeedbackTutors(feedback);
  const payrollNames = new Set<string>();

  for (const tutor of payroll.tutors) {
    const tutorName = tutor.name.trim();
    const payrollHours = tutor.total_hours ?? 0;
    payrollNames.add(tutorName);

    const match = feedbackTutors.get(tutorName);
    if (!match) {
      issues.push(
        createIssue(
          'tutor_not_found',
          'high',
          `Tutor ${tutorName} found in payroll but not in feedback data`,
          { tutor_name: tutorName, payroll_hours: payrollHours }
        )
      );
      continue;
    }

    const feedbackHours = roundHours(match.hours);
    const difference = roundHours(Math.abs(payrollHours - match.hours));
    if (difference > rules.hoursTolerance) {
      issues.push(
        createIssue(
          'tutor_hours_mismatch',
          difference > rules.hoursHighSeverityGap ? 'high' : 'medium',
          `Tutor hours mismatch for ${tutorName}`,
          {
            tutor_name: tutorName,
            payroll_hours: payrollHours,
            feedback_hours: feedbackHours,
            difference,
            students: match.students,
          }
        )
      );
    }
  }

  for (const [tutorName, data] of feedbackTutors) {
    if (payrollNames.has(tutorName)) continue;
    issues.push(
      createIssue(
        'tutor_missing_from_payroll',
        'high',
        `Tutor ${tutorName} found in feedback data but not in payroll`,
        { tutor_name: tutorName, feedback_hours: roundHours(data.hours), students: data.students }
      )
    );
  }

  return issues;
}

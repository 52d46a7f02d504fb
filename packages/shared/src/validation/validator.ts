/**
 * Reconciliation Validator
 *
 * Runs the four checks in a fixed order and concatenates their issues:
 * tutor hours, working hours, weekly hours, no-shows. Issue order is the
 * addressing scheme for resolutions, so it must stay stable.
 */

import type {
  ParsedFeedback,
  ParsedPayroll,
  ValidationIssue,
  ValidationOutcome,
  ValidationTotals,
} from '../types';
import { resolveRules, type ValidationRules } from './rules';
import { checkTutorHours } from './checks/tutor-hours';
import { checkWorkingHours } from './checks/working-hours';
import { checkWeeklyHours } from './checks/weekly-hours';
import { checkNoShows } from './checks/no-shows';
import { roundHours } from './checks/helpers';
import { validationIssuesCounter } from '../metrics';
import { logger } from '../logger';

export function computeTotals(payroll: ParsedPayroll, feedback: ParsedFeedback): ValidationTotals {
  const attendedHours = feedback.sessions
    .filter((s) => !s.is_no_show)
    .reduce((sum, s) => sum + s.hours, 0);

  return {
    total_sessions: feedback.sessions.length,
    total_students: feedback.students.length,
    total_tutors: payroll.tutors.length,
    total_hours: roundHours(attendedHours),
  };
}

export function validate(
  payroll: ParsedPayroll,
  feedback: ParsedFeedback,
  overrides: Partial<ValidationRules> = {}
): ValidationOutcome {
  const rules = resolveRules(overrides);

  const issues: ValidationIssue[] = [
    ...checkTutorHours(payroll, feedback, rules),
    ...checkWorkingHours(feedback, rules),
    ...checkWeeklyHours(feedback, rules),
    ...checkNoShows(feedback, rules),
  ];

  for (const issue of issues) {
    validationIssuesCounter.inc({ issue_type: issue.issue_type, severity: issue.severity });
  }

  const outcome: ValidationOutcome = {
    status: issues.length > 0 ? 'invalid' : 'valid',
    issues,
    validation_date: new Date().toISOString(),
    total_issues: issues.length,
    ...computeTotals(payroll, feedback),
  };

  logger.info('Validation complete', {
    status: outcome.status,
    total_issues: outcome.total_issues,
    total_sessions: outcome.total_sessions,
  });

  return outcome;
}

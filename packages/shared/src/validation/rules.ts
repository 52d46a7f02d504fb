/**
 * Validation thresholds. Callers may override any subset.
 */
export interface ValidationRules {
  /** Payroll/feedback hour gaps above this are mismatches */
  hoursTolerance: number;
  /** Gaps above this are high severity, otherwise medium */
  hoursHighSeverityGap: number;
  /** Earliest allowed session start, minutes past midnight */
  earliestStartMinutes: number;
  /** Latest allowed session end, minutes past midnight */
  latestEndMinutes: number;
  /** Maximum hours per student per ISO week */
  maxWeeklyHours: number;
  /** Maximum no-shows per student per month */
  maxMonthlyNoShows: number;
}

export const DEFAULT_VALIDATION_RULES: ValidationRules = {
  hoursTolerance: 0.5,
  hoursHighSeverityGap: 2,
  earliestStartMinutes: 10 * 60,
  latestEndMinutes: 19 * 60,
  maxWeeklyHours: 4,
  maxMonthlyNoShows: 2,
};

export function resolveRules(overrides: Partial<ValidationRules> = {}): ValidationRules {
  return { ...DEFAULT_VALIDATION_RULES, ...overrides };
}

import type { ValidationIssue, ValidationSummary } from '../types';

/**
 * Counts for the reviewer dashboard.
 */
export function summarizeIssues(issues: ValidationIssue[]): ValidationSummary {
  const summary: ValidationSummary = {
    total_issues: issues.length,
    errors: 0,
    warnings: 0,
    resolved: 0,
    unresolved: 0,
    by_type: {},
    by_severity: { error: 0, warning: 0 },
  };

  for (const issue of issues) {
    if (issue.severity === 'error') summary.errors++;
    else summary.warnings++;

    if (issue.resolved) summary.resolved++;
    else summary.unresolved++;

    summary.by_type[issue.issue_type] = (summary.by_type[issue.issue_type] ?? 0) + 1;
    summary.by_severity[issue.severity]++;
  }

  return summary;
}

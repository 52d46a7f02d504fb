import type { IssueLevel, IssueSeverity, IssueType, ValidationIssue } from '../types';

const SEVERITY_BY_LEVEL: Record<IssueLevel, IssueSeverity> = {
  high: 'error',
  medium: 'warning',
  low: 'warning',
};

export function severityFor(level: IssueLevel): IssueSeverity {
  return SEVERITY_BY_LEVEL[level];
}

/**
 * Build an unresolved issue with its severity derived from the level.
 */
export function createIssue(
  issueType: IssueType,
  level: IssueLevel,
  description: string,
  details: Record<string, unknown>
): ValidationIssue {
  return {
    issue_type: issueType,
    level,
    severity: severityFor(level),
    description,
    details,
    resolved: false,
  };
}

/**
 * Issue Resolution Tracker
 *
 * Marks issues resolved in place, addressed by their index in the stored
 * list. Issues are never removed and resolving twice overwrites the note.
 */

import type { IssueResolution, ValidationOutcome } from '../types';
import { logger } from '../logger';

export function allIssuesResolved(result: Pick<ValidationOutcome, 'issues'>): boolean {
  return result.issues.every((issue) => issue.resolved);
}

/**
 * The gate output generators check before producing documents.
 */
export function isReadyForGeneration(result: Pick<ValidationOutcome, 'issues'>): boolean {
  return allIssuesResolved(result);
}

/**
 * Apply resolutions to `result.issues`. Out-of-range ids are skipped.
 *
 * @returns whether every issue is now resolved
 */
export function applyResolutions(
  result: Pick<ValidationOutcome, 'issues'>,
  resolutions: IssueResolution[]
): boolean {
  for (const resolution of resolutions) {
    const issue = Number.isInteger(resolution.issue_id) ? result.issues[resolution.issue_id] : undefined;
    if (!issue) {
      logger.warn('Ignoring resolution for unknown issue', {
        issue_id: resolution.issue_id,
        total_issues: result.issues.length,
      });
      continue;
    }

    issue.resolved = true;
    issue.resolution_note = resolution.resolution;
    if (resolution.corrected_value !== undefined) {
      issue.corrected_value = resolution.corrected_value;
    }
  }

  return allIssuesResolved(result);
}

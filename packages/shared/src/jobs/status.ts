/**
 * Processing job lifecycle.
 *
 *   uploaded -> processing -> validated -> generating -> completed
 *                         \-> failed     \-> completed (all issues resolved)
 *
 * Any non-terminal state after `uploaded` may fail.
 */

import type { ProcessingJob, ProcessingStatus } from '../types';
import { InvalidTransitionError } from '../errors';

export const TRANSITIONS: Record<ProcessingStatus, readonly ProcessingStatus[]> = {
  uploaded: ['processing'],
  processing: ['validated', 'failed'],
  validated: ['generating', 'completed', 'failed'],
  generating: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: ProcessingStatus, to: ProcessingStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ProcessingStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function assertTransition(from: ProcessingStatus, to: ProcessingStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/**
 * Fields to write when moving a job to `to`. Throws on an invalid move.
 */
export function transitionPatch(
  job: Pick<ProcessingJob, 'status'>,
  to: ProcessingStatus,
  extra: Partial<ProcessingJob> = {}
): Partial<ProcessingJob> {
  assertTransition(job.status, to);

  const now = new Date().toISOString();
  const patch: Partial<ProcessingJob> = { ...extra, status: to, updated_at: now };
  if (to === 'completed') patch.completed_at = now;
  return patch;
}

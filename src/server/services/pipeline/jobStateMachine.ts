import { IllegalStateTransitionError } from '../../types/errors.js';
import type { JobStatus } from '../../types/job.js';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  idle: ['running'],
  running: ['paused', 'completed', 'failed', 'cancelled'],
  paused: ['running', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: JobStatus): readonly JobStatus[] {
  return TRANSITIONS[from];
}

/**
 * @throws IllegalStateTransitionError when `from -> to` is not a legal move
 */
export function assertTransition(from: JobStatus, to: JobStatus, jobId?: string): void {
  if (!canTransition(from, to)) {
    throw new IllegalStateTransitionError(from, to, jobId ? { jobId } : undefined);
  }
}

import type { JobStatus } from '../schemas/jobs.schema';
import { JobTransitionError } from '../errors/job.error';

/**
 * Valid job status transitions
 */
export const JOB_STATE_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: ['pending'] // Manual retry only
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_STATE_TRANSITIONS[from].includes(to);
}

/**
 * Throws when the transition table forbids the move
 */
export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new JobTransitionError(jobId, from, to);
  }
}

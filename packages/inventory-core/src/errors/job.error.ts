import { BaseError } from './base.error';
import type { JobStatus } from '../schemas/jobs.schema';

/**
 * Job transition error - requested state change is not allowed
 */
export class JobTransitionError extends BaseError {
  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(
      `Job ${jobId} cannot move from ${from} to ${to}`,
      'JOB_TRANSITION_ERROR',
      409,
      { jobId, from, to }
    );
  }
}

/**
 * Job not found error
 */
export class JobNotFoundError extends BaseError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND', 404, { jobId });
  }
}

/**
 * Job store error - persistence layer failure
 */
export class JobStoreError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'JOB_STORE_ERROR', 500, context);
  }
}

import * as path from 'path';
import {
  createLogger,
  JobNotFoundError,
  JobTransitionError,
  logJobEvent,
  type CreateJobResult,
  type EnvironmentTag,
  type IngestJob,
  type JobStore
} from '@inventory/core';

const logger = createLogger('job-lifecycle');

export type EnqueueRequest = {
  sourcePath: string;
  tag: EnvironmentTag | null;
};

/**
 * Create a pending job for the path unless one is already pending or processing
 */
export async function enqueueFile(store: JobStore, request: EnqueueRequest): Promise<CreateJobResult> {
  const sourcePath = path.resolve(request.sourcePath);

  const result = await store.createIfAbsent({
    source_path: sourcePath,
    file_name: path.basename(sourcePath),
    environment: request.tag?.environment ?? null,
    client: request.tag?.client ?? null,
    datacenter: request.tag?.datacenter ?? null
  });

  if (result.created) {
    logJobEvent(logger, 'job.created', result.job, {
      environment: result.job.environment,
      client: result.job.client
    });
  } else {
    logger.debug({ jobId: result.job.id, sourcePath, status: result.job.status }, 'Active job exists, skipping');
  }

  return result;
}

/**
 * Reset a failed job to pending. Any other status is a conflict.
 */
export async function retryJob(store: JobStore, id: string): Promise<IngestJob> {
  const job = await store.get(id);
  if (!job) {
    throw new JobNotFoundError(id);
  }

  if (job.status !== 'failed') {
    throw new JobTransitionError(id, job.status, 'pending');
  }

  const reset = await store.transition(id, 'failed', 'pending', {
    error: null,
    started_at: null,
    completed_at: null,
    artifacts: [],
    vm_count: 0,
    alarm_count: 0
  });

  // Lost a race with another retry
  if (!reset) {
    const current = await store.get(id);
    throw new JobTransitionError(id, current?.status ?? job.status, 'pending');
  }

  logJobEvent(logger, 'job.retried', reset);
  return reset;
}

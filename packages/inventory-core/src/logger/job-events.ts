import type { Logger } from './logger';
import type { IngestJob } from '../schemas/jobs.schema';

export type JobEvent =
  | 'job.created'
  | 'job.started'
  | 'job.completed'
  | 'job.failed'
  | 'job.retried'
  | 'job.deleted';

const EVENT_MESSAGES: Record<JobEvent, string> = {
  'job.created': 'Job created',
  'job.started': 'Job started',
  'job.completed': 'Job completed',
  'job.failed': 'Job failed',
  'job.retried': 'Job reset for retry',
  'job.deleted': 'Job deleted'
};

/**
 * Emit one lifecycle record keyed by job id
 */
export function logJobEvent(
  logger: Logger,
  event: JobEvent,
  job: Pick<IngestJob, 'id' | 'source_path' | 'status'>,
  details: Record<string, unknown> = {}
): void {
  const record = {
    event,
    jobId: job.id,
    sourcePath: job.source_path,
    status: job.status,
    ...details
  };

  if (event === 'job.failed') {
    logger.error(record, EVENT_MESSAGES[event]);
  } else {
    logger.info(record, EVENT_MESSAGES[event]);
  }
}

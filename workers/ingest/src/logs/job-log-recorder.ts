import { createLogger, type JobLogSink, type JobStore, type NewJobLog } from '@inventory/core';

const logger = createLogger('job-log-recorder');

/**
 * Persists job-scoped log records through the job store.
 * Writes run in the background; `flush()` waits for them.
 */
export class JobLogRecorder implements JobLogSink {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly store: JobStore) {}

  record(entry: NewJobLog): void {
    const write: Promise<void> = this.store
      .appendLog(entry)
      .catch((error) => {
        // Keyed off jobId so this record is not routed back here
        logger.error({ error, logJobId: entry.job_id }, 'Failed to record job log');
      })
      .finally(() => {
        this.pending.delete(write);
      });

    this.pending.add(write);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}

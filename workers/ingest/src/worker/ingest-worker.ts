import {
  ExportWriteError,
  logJobEvent,
  RelocationError,
  type IngestJob,
  type JobOutcome,
  type JobPatch,
  type JobStore,
  type WorkerConfig
} from '@inventory/core';
import { BaseWorker } from './base-worker';
import type { FileRelocator } from './file-relocator';
import type { IngestJobHandler } from './ingest-job-handler';
import type { RetentionSweeper } from './retention-sweeper';

export type IngestWorkerDeps = {
  store: JobStore;
  handler: IngestJobHandler;
  relocator: FileRelocator;
  sweeper: RetentionSweeper;
  /** Startup scan of the watch root */
  scan?: () => Promise<number>;
  now?: () => Date;
};

/**
 * Drives ingest jobs from pending to a terminal status
 */
export class IngestWorker extends BaseWorker<IngestJob, JobOutcome> {
  private readonly store: JobStore;
  private readonly handler: IngestJobHandler;
  private readonly relocator: FileRelocator;
  private readonly sweeper: RetentionSweeper;
  private readonly scan?: () => Promise<number>;
  private readonly now: () => Date;

  constructor(config: WorkerConfig, deps: IngestWorkerDeps) {
    super(config);
    this.store = deps.store;
    this.handler = deps.handler;
    this.relocator = deps.relocator;
    this.sweeper = deps.sweeper;
    this.scan = deps.scan;
    this.now = deps.now ?? (() => new Date());
  }

  protected async claimJobs(limit: number): Promise<IngestJob[]> {
    const jobs = await this.store.claimPending(limit);
    for (const job of jobs) {
      logJobEvent(this.logger, 'job.started', job, { startedAt: job.started_at });
    }
    return jobs;
  }

  protected handleJob(job: IngestJob): Promise<JobOutcome> {
    return this.handler.handle(job);
  }

  protected async completeJob(job: IngestJob, outcome: JobOutcome, duration: number): Promise<void> {
    const patch: JobPatch = {
      artifacts: outcome.artifacts,
      vm_count: outcome.vmCount,
      alarm_count: outcome.alarmCount,
      completed_at: this.now().toISOString()
    };

    // Fallback tags are written only where the row had none
    if (job.environment === null) patch.environment = outcome.tags.environment;
    if (job.client === null) patch.client = outcome.tags.client;
    if (job.datacenter === null) patch.datacenter = outcome.tags.datacenter;

    const completed = await this.store.transition(job.id, 'processing', 'completed', patch);
    if (!completed) {
      this.logger.warn({ jobId: job.id }, 'Job left processing before completion was recorded');
      return;
    }

    logJobEvent(this.logger, 'job.completed', completed, {
      duration,
      vmCount: completed.vm_count,
      alarmCount: completed.alarm_count,
      artifacts: completed.artifacts.length
    });

    try {
      await this.relocator.relocate(job.source_path, job.id);
    } catch (error) {
      if (!(error instanceof RelocationError)) throw error;
      this.logger.error({ error, jobId: job.id }, 'Relocation failed, source left in place');
    }
  }

  protected async failJob(job: IngestJob, error: unknown, duration: number): Promise<void> {
    const message = error instanceof Error ? error.message : 'Unknown error';

    const failed = await this.store.transition(job.id, 'processing', 'failed', {
      error: message,
      completed_at: this.now().toISOString(),
      artifacts: error instanceof ExportWriteError ? error.writtenPaths : []
    });

    if (!failed) {
      this.logger.warn({ jobId: job.id, error: message }, 'Job left processing before failure was recorded');
      return;
    }

    logJobEvent(this.logger, 'job.failed', failed, { duration, error: message });
  }

  protected async onStartup(): Promise<void> {
    if (!this.scan) return;
    const enqueued = await this.scan();
    this.logger.info({ enqueued }, 'Startup scan finished');
  }

  protected async maintain(): Promise<void> {
    await this.sweeper.sweep();
  }
}

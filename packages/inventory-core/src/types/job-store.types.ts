import type { IngestJob, JobFilter, JobPatch, JobStatus, NewJob } from '../schemas/jobs.schema';
import type { JobLog, NewJobLog } from '../schemas/job-log.schema';
import type { JobAggregates } from '../schemas/job-stats.schema';

export type CreateJobResult = {
  created: boolean;
  job: IngestJob;
};

export type JobStatusCounts = Record<JobStatus, number>;

/**
 * Persisted job queue.
 *
 * `createIfAbsent` and `transition` are conditional writes: two concurrent
 * enqueues for one path cannot both create, and two concurrent claims cannot
 * both take one pending job.
 */
export interface JobStore {
  /** Insert a pending job unless a pending/processing job exists for the path */
  createIfAbsent(input: NewJob): Promise<CreateJobResult>;
  get(id: string): Promise<IngestJob | null>;
  /** Most recent job for the path, in any status */
  findByPath(sourcePath: string): Promise<IngestJob | null>;
  list(filter?: JobFilter): Promise<IngestJob[]>;
  countByStatus(): Promise<JobStatusCounts>;
  /** Atomically move up to `limit` oldest pending jobs to processing */
  claimPending(limit: number): Promise<IngestJob[]>;
  update(id: string, patch: JobPatch): Promise<IngestJob>;
  /** Apply the patch only if the job is still in `from`; null otherwise */
  transition(id: string, from: JobStatus, to: JobStatus, patch?: JobPatch): Promise<IngestJob | null>;
  /** Terminal jobs whose completed_at is before the cutoff */
  listTerminalBefore(cutoff: Date): Promise<IngestJob[]>;
  delete(id: string): Promise<boolean>;
  /** Totals over all jobs; `recent_*` count from `since` */
  aggregate(since: Date): Promise<JobAggregates>;

  appendLog(entry: NewJobLog): Promise<void>;
  /** Newest first */
  listLogs(jobId: string): Promise<JobLog[]>;
  /** Remove log entries older than the cutoff; returns how many */
  deleteLogsBefore(cutoff: Date): Promise<number>;

  ping(): Promise<void>;
}

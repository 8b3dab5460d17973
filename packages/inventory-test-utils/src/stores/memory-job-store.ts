import { randomUUID } from 'crypto';
import {
  ACTIVE_JOB_STATUSES,
  assertTransition,
  jobFilterSchema,
  JobNotFoundError,
  newJobSchema,
  TERMINAL_JOB_STATUSES,
  type CreateJobResult,
  type GroupAggregate,
  type IngestJob,
  type JobAggregates,
  type JobLog,
  type JobFilter,
  type JobPatch,
  type JobStatus,
  type JobStatusCounts,
  type JobStore,
  type NewJob,
  type NewJobLog
} from '@inventory/core';

export type MemoryJobStoreOptions = {
  now?: () => Date;
};

function copy(job: IngestJob): IngestJob {
  return { ...job, artifacts: [...job.artifacts] };
}

function groupBy(jobs: IngestJob[], keyOf: (job: IngestJob) => string | null): GroupAggregate[] {
  const groups = new Map<string, GroupAggregate>();

  for (const job of jobs) {
    const key = keyOf(job);
    if (key === null) continue;

    const group = groups.get(key) ?? { key, job_count: 0, vm_count: 0, alarm_count: 0 };
    group.job_count++;
    group.vm_count += job.vm_count;
    group.alarm_count += job.alarm_count;
    groups.set(key, group);
  }

  return [...groups.values()].sort((a, b) => a.key.localeCompare(b.key));
}

/**
 * In-process JobStore. Each check-and-write runs without an await in between,
 * so concurrent callers see the same guarantees as the SQL store.
 */
export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, IngestJob>();
  private readonly logs: JobLog[] = [];
  private readonly now: () => Date;
  pingError: Error | null = null;

  constructor(options: MemoryJobStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /** Insert a job row as-is */
  seed(job: IngestJob): IngestJob {
    this.jobs.set(job.id, copy(job));
    return copy(job);
  }

  all(): IngestJob[] {
    return [...this.jobs.values()].map(copy);
  }

  allLogs(): JobLog[] {
    return this.logs.map((log) => ({ ...log }));
  }

  async createIfAbsent(input: NewJob): Promise<CreateJobResult> {
    const row = newJobSchema.parse(input);

    const active = [...this.jobs.values()].find(
      (job) => job.source_path === row.source_path && ACTIVE_JOB_STATUSES.includes(job.status)
    );
    if (active) {
      return { created: false, job: copy(active) };
    }

    const job: IngestJob = {
      id: randomUUID(),
      ...row,
      status: 'pending',
      vm_count: 0,
      alarm_count: 0,
      artifacts: [],
      error: null,
      created_at: this.now().toISOString(),
      started_at: null,
      completed_at: null
    };
    this.jobs.set(job.id, job);
    return { created: true, job: copy(job) };
  }

  async get(id: string): Promise<IngestJob | null> {
    const job = this.jobs.get(id);
    return job ? copy(job) : null;
  }

  async findByPath(sourcePath: string): Promise<IngestJob | null> {
    const matches = [...this.jobs.values()].filter((job) => job.source_path === sourcePath);
    const latest = matches.at(-1);
    return latest ? copy(latest) : null;
  }

  async list(filter: JobFilter = {}): Promise<IngestJob[]> {
    const { status, environment, client, limit, offset } = jobFilterSchema.parse(filter);

    return [...this.jobs.values()]
      .filter((job) => !status || job.status === status)
      .filter((job) => !environment || job.environment === environment)
      .filter((job) => !client || job.client === client)
      .reverse()
      .slice(offset, offset + limit)
      .map(copy);
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const counts: JobStatusCounts = { pending: 0, processing: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      counts[job.status]++;
    }
    return counts;
  }

  async claimPending(limit: number): Promise<IngestJob[]> {
    const startedAt = this.now().toISOString();
    const claimed = [...this.jobs.values()]
      .filter((job) => job.status === 'pending')
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .slice(0, limit);

    for (const job of claimed) {
      job.status = 'processing';
      job.started_at = startedAt;
    }
    return claimed.map(copy);
  }

  async update(id: string, patch: JobPatch): Promise<IngestJob> {
    const job = this.jobs.get(id);
    if (!job) throw new JobNotFoundError(id);

    Object.assign(job, patch);
    return copy(job);
  }

  async transition(id: string, from: JobStatus, to: JobStatus, patch: JobPatch = {}): Promise<IngestJob | null> {
    assertTransition(id, from, to);

    const job = this.jobs.get(id);
    if (!job || job.status !== from) return null;

    Object.assign(job, patch, { status: to });
    return copy(job);
  }

  async listTerminalBefore(cutoff: Date): Promise<IngestJob[]> {
    return [...this.jobs.values()]
      .filter((job) => TERMINAL_JOB_STATUSES.includes(job.status))
      .filter((job) => job.completed_at !== null && new Date(job.completed_at) < cutoff)
      .map(copy);
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async aggregate(since: Date): Promise<JobAggregates> {
    const jobs = [...this.jobs.values()];
    const counts: JobStatusCounts = { pending: 0, processing: 0, completed: 0, failed: 0 };
    for (const job of jobs) {
      counts[job.status]++;
    }

    return {
      counts,
      recent_jobs: jobs.filter((job) => new Date(job.created_at) >= since).length,
      total_vms: jobs.reduce((sum, job) => sum + job.vm_count, 0),
      total_alarms: jobs.reduce((sum, job) => sum + job.alarm_count, 0),
      by_environment: groupBy(jobs, (job) => job.environment),
      by_client: groupBy(jobs, (job) => job.client),
      recent_errors: this.logs.filter(
        (log) => (log.level === 'error' || log.level === 'fatal') && new Date(log.created_at) >= since
      ).length
    };
  }

  async appendLog(entry: NewJobLog): Promise<void> {
    this.logs.push({ id: randomUUID(), ...entry });
  }

  async listLogs(jobId: string): Promise<JobLog[]> {
    return this.logs
      .filter((log) => log.job_id === jobId)
      .reverse()
      .map((log) => ({ ...log }));
  }

  async deleteLogsBefore(cutoff: Date): Promise<number> {
    const before = this.logs.length;
    const kept = this.logs.filter((log) => new Date(log.created_at) >= cutoff);
    this.logs.splice(0, this.logs.length, ...kept);
    return before - kept.length;
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }
}

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import {
  ACTIVE_JOB_STATUSES,
  assertTransition,
  createLogger,
  ingestJobSchema,
  jobAggregatesSchema,
  jobFilterSchema,
  jobLogSchema,
  jobStatusEnum,
  JobNotFoundError,
  JobStoreError,
  newJobSchema,
  TERMINAL_JOB_STATUSES,
  type CreateJobResult,
  type IngestJob,
  type JobAggregates,
  type JobFilter,
  type JobLog,
  type JobPatch,
  type JobStatus,
  type JobStatusCounts,
  type JobStore,
  type NewJob,
  type NewJobLog
} from '@inventory/core';

const logger = createLogger('supabase-job-store');

const TABLE = 'ingest_jobs';
const LOG_TABLE = 'ingest_job_logs';
const UNIQUE_VIOLATION = '23505';

type PostgrestFailure = { message: string; code?: string };

function storeError(operation: string, error: PostgrestFailure, context: Record<string, unknown> = {}): JobStoreError {
  logger.error({ error, operation, ...context }, 'Job store operation failed');
  return new JobStoreError(`${operation} failed: ${error.message}`, { code: error.code, ...context });
}

function parseJob(row: unknown): IngestJob {
  return ingestJobSchema.parse(row);
}

function parseJobs(rows: unknown): IngestJob[] {
  return Array.isArray(rows) ? rows.map(parseJob) : [];
}

function parseLogs(rows: unknown): JobLog[] {
  return Array.isArray(rows) ? rows.map((row) => jobLogSchema.parse(row)) : [];
}

/**
 * Job store over the `ingest_jobs` and `ingest_job_logs` tables.
 * Conditional insert relies on the partial unique index on active paths;
 * claiming goes through `claim_ingest_jobs`, statistics through `ingest_job_stats`.
 */
export class SupabaseJobStore implements JobStore {
  private db: SupabaseClient;

  constructor(db?: SupabaseClient) {
    if (db) {
      this.db = db;
      return;
    }

    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!supabaseUrl || !supabaseKey) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY required');
    }

    this.db = createClient(supabaseUrl, supabaseKey);
  }

  async createIfAbsent(input: NewJob): Promise<CreateJobResult> {
    const row = newJobSchema.parse(input);

    const { data, error } = await this.db
      .from(TABLE)
      .insert({ ...row, status: 'pending' })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        const existing = await this.findActive(row.source_path);
        if (existing) {
          return { created: false, job: existing };
        }
      }
      throw storeError('createIfAbsent', error, { sourcePath: row.source_path });
    }

    return { created: true, job: parseJob(data) };
  }

  async get(id: string): Promise<IngestJob | null> {
    const { data, error } = await this.db.from(TABLE).select('*').eq('id', id).maybeSingle();

    if (error) throw storeError('get', error, { jobId: id });
    return data ? parseJob(data) : null;
  }

  async findByPath(sourcePath: string): Promise<IngestJob | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('source_path', sourcePath)
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw storeError('findByPath', error, { sourcePath });
    return data ? parseJob(data) : null;
  }

  async list(filter: JobFilter = {}): Promise<IngestJob[]> {
    const { status, environment, client, limit, offset } = jobFilterSchema.parse(filter);

    let query = this.db.from(TABLE).select('*');
    if (status) query = query.eq('status', status);
    if (environment) query = query.eq('environment', environment);
    if (client) query = query.eq('client', client);

    const { data, error } = await query
      .order('created_at', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) throw storeError('list', error);
    return parseJobs(data);
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const counts: JobStatusCounts = { pending: 0, processing: 0, completed: 0, failed: 0 };

    for (const status of jobStatusEnum.options) {
      const { count, error } = await this.db
        .from(TABLE)
        .select('id', { count: 'exact', head: true })
        .eq('status', status);

      if (error) throw storeError('countByStatus', error, { status });
      counts[status] = count ?? 0;
    }

    return counts;
  }

  async claimPending(limit: number): Promise<IngestJob[]> {
    const { data, error } = await this.db.rpc('claim_ingest_jobs', { p_limit: limit });

    if (error) throw storeError('claimPending', error, { limit });
    return parseJobs(data);
  }

  async update(id: string, patch: JobPatch): Promise<IngestJob> {
    const { data, error } = await this.db.from(TABLE).update(patch).eq('id', id).select().maybeSingle();

    if (error) throw storeError('update', error, { jobId: id });
    if (!data) throw new JobNotFoundError(id);
    return parseJob(data);
  }

  async transition(id: string, from: JobStatus, to: JobStatus, patch: JobPatch = {}): Promise<IngestJob | null> {
    assertTransition(id, from, to);

    const { data, error } = await this.db
      .from(TABLE)
      .update({ ...patch, status: to })
      .eq('id', id)
      .eq('status', from)
      .select()
      .maybeSingle();

    if (error) throw storeError('transition', error, { jobId: id, from, to });
    return data ? parseJob(data) : null;
  }

  async listTerminalBefore(cutoff: Date): Promise<IngestJob[]> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .in('status', [...TERMINAL_JOB_STATUSES])
      .lt('completed_at', cutoff.toISOString());

    if (error) throw storeError('listTerminalBefore', error);
    return parseJobs(data);
  }

  async delete(id: string): Promise<boolean> {
    const { data, error } = await this.db.from(TABLE).delete().eq('id', id).select('id');

    if (error) throw storeError('delete', error, { jobId: id });
    return Array.isArray(data) && data.length > 0;
  }

  async aggregate(since: Date): Promise<JobAggregates> {
    const { data, error } = await this.db.rpc('ingest_job_stats', { p_since: since.toISOString() });

    if (error) throw storeError('aggregate', error);
    return jobAggregatesSchema.parse(data);
  }

  async appendLog(entry: NewJobLog): Promise<void> {
    const { error } = await this.db.from(LOG_TABLE).insert(entry);
    if (error) throw storeError('appendLog', error, { jobId: entry.job_id });
  }

  async listLogs(jobId: string): Promise<JobLog[]> {
    const { data, error } = await this.db
      .from(LOG_TABLE)
      .select('*')
      .eq('job_id', jobId)
      .order('created_at', { ascending: false });

    if (error) throw storeError('listLogs', error, { jobId });
    return parseLogs(data);
  }

  async deleteLogsBefore(cutoff: Date): Promise<number> {
    const { data, error } = await this.db
      .from(LOG_TABLE)
      .delete()
      .lt('created_at', cutoff.toISOString())
      .select('id');

    if (error) throw storeError('deleteLogsBefore', error);
    return Array.isArray(data) ? data.length : 0;
  }

  async ping(): Promise<void> {
    const { error } = await this.db.from(TABLE).select('id', { count: 'exact', head: true }).limit(1);
    if (error) throw storeError('ping', error);
  }

  private async findActive(sourcePath: string): Promise<IngestJob | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('source_path', sourcePath)
      .in('status', [...ACTIVE_JOB_STATUSES])
      .limit(1)
      .maybeSingle();

    if (error) throw storeError('findActive', error, { sourcePath });
    return data ? parseJob(data) : null;
  }
}

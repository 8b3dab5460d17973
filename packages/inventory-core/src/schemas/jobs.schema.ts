import { z } from 'zod';

/**
 * Job status enum
 */
export const jobStatusEnum = z.enum([
  'pending',
  'processing',
  'completed',
  'failed'
]);

export type JobStatus = z.infer<typeof jobStatusEnum>;

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed'];
export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = ['pending', 'processing'];

/**
 * Ingest job schema - one row per source file run
 */
export const ingestJobSchema = z.object({
  // Identity
  id: z.string().uuid().describe('Unique job identifier'),
  file_name: z.string().min(1).describe('Base name of the source file'),
  source_path: z.string().min(1).describe('Absolute path of the source file'),

  // State
  status: jobStatusEnum.default('pending').describe('Current job status'),

  // Environment tag
  environment: z.string().nullable().describe('Environment tag'),
  client: z.string().nullable().describe('Client tag'),
  datacenter: z.string().nullable().describe('Datacenter tag'),

  // Results
  vm_count: z.number().int().nonnegative().default(0).describe('Extracted VM records'),
  alarm_count: z.number().int().nonnegative().default(0).describe('Extracted alarm records'),
  artifacts: z.array(z.string()).default([]).describe('Produced artifact paths'),
  error: z.string().nullable().describe('Failure message'),

  // Timestamps
  created_at: z.string().datetime({ offset: true }).describe('Creation timestamp'),
  started_at: z.string().datetime({ offset: true }).nullable().describe('When processing started'),
  completed_at: z.string().datetime({ offset: true }).nullable().describe('When the job reached a terminal status')
});

export type IngestJob = z.infer<typeof ingestJobSchema>;

/**
 * Input for enqueueing a job
 */
export const newJobSchema = z.object({
  source_path: z.string().min(1),
  file_name: z.string().min(1),
  environment: z.string().nullable().default(null),
  client: z.string().nullable().default(null),
  datacenter: z.string().nullable().default(null)
});

export type NewJob = z.input<typeof newJobSchema>;

/**
 * Fields a worker may write alongside a transition
 */
export type JobPatch = Partial<
  Pick<
    IngestJob,
    | 'environment'
    | 'client'
    | 'datacenter'
    | 'vm_count'
    | 'alarm_count'
    | 'artifacts'
    | 'error'
    | 'started_at'
    | 'completed_at'
  >
>;

/**
 * Job list filter
 */
export const jobFilterSchema = z.object({
  status: jobStatusEnum.optional(),
  environment: z.string().min(1).optional(),
  client: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().nonnegative().default(0)
});

export type JobFilter = z.input<typeof jobFilterSchema>;

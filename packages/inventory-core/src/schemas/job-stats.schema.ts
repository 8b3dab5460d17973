import { z } from 'zod';

const countSchema = z.coerce.number().int().nonnegative();

/**
 * Job, VM and alarm totals for one environment or client
 */
export const groupAggregateSchema = z.object({
  key: z.string(),
  job_count: countSchema,
  vm_count: countSchema,
  alarm_count: countSchema
});

export type GroupAggregate = z.infer<typeof groupAggregateSchema>;

/**
 * Raw aggregates over all jobs, as returned by a JobStore
 */
export const jobAggregatesSchema = z.object({
  counts: z.object({
    pending: countSchema,
    processing: countSchema,
    completed: countSchema,
    failed: countSchema
  }),
  recent_jobs: countSchema.describe('Jobs created since the window start'),
  total_vms: countSchema,
  total_alarms: countSchema,
  by_environment: z.array(groupAggregateSchema).describe('Jobs with an environment, ordered by key'),
  by_client: z.array(groupAggregateSchema).describe('Jobs with a client, ordered by key'),
  recent_errors: countSchema.describe('Error and fatal job log entries since the window start')
});

export type JobAggregates = z.infer<typeof jobAggregatesSchema>;

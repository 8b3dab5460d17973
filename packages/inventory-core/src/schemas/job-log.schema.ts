import { z } from 'zod';

/**
 * Levels persisted to the per-job log; debug and trace stay on the console
 */
export const jobLogLevelEnum = z.enum(['info', 'warn', 'error', 'fatal']);

export type JobLogLevel = z.infer<typeof jobLogLevelEnum>;

/**
 * Job log schema - one processing log line recorded against a job
 */
export const jobLogSchema = z.object({
  id: z.string().uuid().describe('Unique log entry identifier'),
  job_id: z.string().uuid().describe('Job the entry belongs to'),
  level: jobLogLevelEnum.describe('Log level'),
  message: z.string().describe('Rendered log message'),
  created_at: z.string().datetime({ offset: true }).describe('When the entry was logged')
});

export type JobLog = z.infer<typeof jobLogSchema>;

export const newJobLogSchema = jobLogSchema.omit({ id: true });

export type NewJobLog = z.infer<typeof newJobLogSchema>;

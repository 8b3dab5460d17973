import { z } from 'zod';

/**
 * Worker configuration
 */
export const workerConfigSchema = z.object({
  workerType: z.string().min(1).describe('Type of worker (e.g., inventory_ingest)'),
  instanceId: z.string().min(1).describe('Unique instance identifier'),
  batchSize: z.number().int().positive().describe('Max jobs claimed per pass'),
  processingIntervalMs: z.number().int().positive().describe('Interval between processing passes'),
  cleanupIntervalMs: z.number().int().positive().describe('Interval between retention sweeps'),
  startupScanDelayMs: z.number().int().nonnegative().describe('Delay before the one-shot startup scan')
});

export type WorkerConfig = z.infer<typeof workerConfigSchema>;

/**
 * Outcome of a single job's processing
 */
export type JobOutcome = {
  artifacts: string[];
  vmCount: number;
  alarmCount: number;
  tags: { environment: string; client: string; datacenter: string };
};

/**
 * Summary of one processing pass
 */
export type PassSummary = {
  claimed: number;
  completed: number;
  failed: number;
};

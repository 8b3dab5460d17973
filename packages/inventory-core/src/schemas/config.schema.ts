import { z } from 'zod';
import { environmentPatternTableSchema } from './environment.schema';

export const SUPPORTED_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

export const exportFormatEnum = z.enum(['csv', 'excel', 'json']);

export type ExportFormat = z.infer<typeof exportFormatEnum>;

/**
 * Static configuration supplied at startup
 */
export const ingestConfigSchema = z.object({
  watchDirectory: z.string().min(1),
  processedDirectory: z.string().min(1),
  outputDirectory: z.string().min(1),
  environmentPatterns: environmentPatternTableSchema,
  maxFileSizeMb: z.number().positive(),
  settleDelayMs: z.number().int().nonnegative(),
  batchSize: z.number().int().positive(),
  processingIntervalMinutes: z.number().positive(),
  cleanupIntervalHours: z.number().positive(),
  retentionDays: z.number().positive(),
  exportFormats: z.array(exportFormatEnum).min(1),
  separateByEnvironment: z.boolean(),
  startupScanDelayMs: z.number().int().nonnegative()
});

export type IngestConfig = z.infer<typeof ingestConfigSchema>;

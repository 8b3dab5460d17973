import { z } from 'zod';

export const UNKNOWN_TAG = 'unknown';

/**
 * Environment tag resolved once per job
 */
export const environmentTagSchema = z.object({
  environment: z.string().min(1),
  client: z.string().min(1),
  datacenter: z.string().min(1)
});

export type EnvironmentTag = z.infer<typeof environmentTagSchema>;

/**
 * One row of the configured pattern table.
 * Fields left out keep their default.
 */
export const environmentPatternSchema = z.object({
  pattern: z.string().min(1).describe('Substring matched anywhere in the path'),
  environment: z.string().min(1).optional(),
  client: z.string().min(1).optional(),
  datacenter: z.string().min(1).optional()
});

export type EnvironmentPattern = z.infer<typeof environmentPatternSchema>;

export const environmentPatternTableSchema = z.array(environmentPatternSchema);

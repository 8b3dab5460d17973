import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import {
  CLEANUP_INTERVAL_HOURS,
  FILE_SETTLE_DELAY_MS,
  JOB_BATCH_SIZE,
  MAX_FILE_SIZE_MB,
  PROCESSING_INTERVAL_MINUTES,
  RETENTION_DAYS,
  STARTUP_SCAN_DELAY_MS
} from '../constants/limits';
import { ConfigError } from '../errors/config.error';
import { environmentPatternTableSchema, type EnvironmentPattern } from '../schemas/environment.schema';
import { ingestConfigSchema, type IngestConfig } from '../schemas/config.schema';

export const DEFAULT_ENVIRONMENT_PATTERNS_PATH = './config/environment-patterns.json';

type Env = Record<string, string | undefined>;

function parseNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number`, { key, value: raw });
  }
  return value;
}

function parseBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

function parseList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load the ordered environment pattern table from a JSON file
 */
export function loadEnvironmentPatterns(filePath: string): EnvironmentPattern[] {
  const absolutePath = resolve(filePath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read environment patterns (${absolutePath})`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  const result = environmentPatternTableSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid environment patterns (${absolutePath})`, {
      issues: result.error.issues
    });
  }
  return result.data;
}

/**
 * Build the static ingest configuration from environment variables
 */
export function loadIngestConfig(env: Env = process.env): IngestConfig {
  const candidate = {
    watchDirectory: resolve(env.WATCH_DIRECTORY ?? './inventory_inbox'),
    processedDirectory: resolve(env.PROCESSED_DIRECTORY ?? './processed'),
    outputDirectory: resolve(env.OUTPUT_DIRECTORY ?? './inventory_outputs'),
    environmentPatterns: loadEnvironmentPatterns(
      env.ENVIRONMENT_PATTERNS_PATH ?? DEFAULT_ENVIRONMENT_PATTERNS_PATH
    ),
    maxFileSizeMb: parseNumber(env, 'MAX_FILE_SIZE_MB', MAX_FILE_SIZE_MB),
    settleDelayMs: parseNumber(env, 'SETTLE_DELAY_MS', FILE_SETTLE_DELAY_MS),
    batchSize: parseNumber(env, 'BATCH_SIZE', JOB_BATCH_SIZE),
    processingIntervalMinutes: parseNumber(env, 'PROCESSING_INTERVAL_MINUTES', PROCESSING_INTERVAL_MINUTES),
    cleanupIntervalHours: parseNumber(env, 'CLEANUP_INTERVAL_HOURS', CLEANUP_INTERVAL_HOURS),
    retentionDays: parseNumber(env, 'RETENTION_DAYS', RETENTION_DAYS),
    exportFormats: parseList(env, 'EXPORT_FORMATS', ['csv', 'excel', 'json']),
    separateByEnvironment: parseBoolean(env, 'SEPARATE_BY_ENVIRONMENT', true),
    startupScanDelayMs: parseNumber(env, 'STARTUP_SCAN_DELAY_MS', STARTUP_SCAN_DELAY_MS)
  };

  const result = ingestConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError('Invalid ingest configuration', {
      issues: result.error.issues.map((issue: z.ZodIssue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }
  return result.data;
}

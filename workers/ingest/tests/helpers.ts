import * as path from 'path';
import type { IngestConfig } from '@inventory/core';
import { createTempDir } from '@inventory/test-utils';

export const WEB_01_DOCUMENT = {
  vms: [{ name: 'web-01', power_state: 'poweredOn', num_cpu: 4, memory_mb: 8192, disk_gb: 100.5 }]
};

/**
 * Config over a fresh temp tree: inbox/, processed/, outputs/
 */
export async function createTestConfig(overrides: Partial<IngestConfig> = {}): Promise<IngestConfig> {
  const root = await createTempDir();

  return {
    watchDirectory: path.join(root, 'inbox'),
    processedDirectory: path.join(root, 'processed'),
    outputDirectory: path.join(root, 'outputs'),
    environmentPatterns: [{ pattern: 'prod-vcenter1', environment: 'production-vc1', client: 'client-a' }],
    maxFileSizeMb: 50,
    settleDelayMs: 10,
    batchSize: 10,
    processingIntervalMinutes: 60,
    cleanupIntervalHours: 24,
    retentionDays: 30,
    exportFormats: ['json'],
    separateByEnvironment: true,
    startupScanDelayMs: 0,
    ...overrides
  };
}

export function tempRoot(config: IngestConfig): string {
  return path.dirname(config.watchDirectory);
}

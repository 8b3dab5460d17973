import * as os from 'os';
import type { IngestConfig, JobStore, WorkerConfig } from '@inventory/core';
import { EnvironmentClassifier } from './classification/environment-classifier';
import { InventoryExtractor } from './extraction/extractor';
import { JobLogRecorder } from './logs/job-log-recorder';
import { InventoryTransformer } from './transform/inventory-transformer';
import { InventoryFileWatcher } from './watcher/file-watcher';
import { FileRelocator } from './worker/file-relocator';
import { IngestJobHandler } from './worker/ingest-job-handler';
import { IngestWorker } from './worker/ingest-worker';
import { RetentionSweeper } from './worker/retention-sweeper';

export type IngestRuntime = {
  config: IngestConfig;
  store: JobStore;
  classifier: EnvironmentClassifier;
  extractor: InventoryExtractor;
  transformer: InventoryTransformer;
  watcher: InventoryFileWatcher;
  worker: IngestWorker;
  /** Register with setJobLogSink to persist job-scoped log records */
  logRecorder: JobLogRecorder;
};

export function toWorkerConfig(config: IngestConfig, instanceId?: string): WorkerConfig {
  return {
    workerType: 'inventory_ingest',
    instanceId: instanceId ?? `ingest-${os.hostname()}-${process.pid}`,
    batchSize: config.batchSize,
    processingIntervalMs: config.processingIntervalMinutes * 60_000,
    cleanupIntervalMs: config.cleanupIntervalHours * 3_600_000,
    startupScanDelayMs: config.startupScanDelayMs
  };
}

/**
 * Wire classifier, extractor, transformer, watcher and worker over one store
 */
export function createIngestRuntime(
  config: IngestConfig,
  store: JobStore,
  options: { now?: () => Date; instanceId?: string } = {}
): IngestRuntime {
  const { now } = options;

  const classifier = new EnvironmentClassifier({
    patterns: config.environmentPatterns,
    root: config.watchDirectory
  });
  const extractor = new InventoryExtractor({ now });
  const transformer = new InventoryTransformer({
    outputDirectory: config.outputDirectory,
    exportFormats: config.exportFormats,
    separateByEnvironment: config.separateByEnvironment,
    classifier,
    now
  });
  const watcher = new InventoryFileWatcher({
    store,
    classifier,
    watchDirectory: config.watchDirectory,
    maxFileSizeMb: config.maxFileSizeMb,
    settleDelayMs: config.settleDelayMs
  });
  const worker = new IngestWorker(toWorkerConfig(config, options.instanceId), {
    store,
    handler: new IngestJobHandler(store, extractor, transformer),
    relocator: new FileRelocator(config.processedDirectory, now),
    sweeper: new RetentionSweeper(store, config.retentionDays, now),
    scan: () => watcher.scanExisting(),
    now
  });

  return {
    config,
    store,
    classifier,
    extractor,
    transformer,
    watcher,
    worker,
    logRecorder: new JobLogRecorder(store)
  };
}

// Library exports only - no worker execution
export { EnvironmentClassifier } from './classification/environment-classifier';
export { InventoryExtractor } from './extraction/extractor';
export { decodeDocument, readDocument, isSupportedExtension } from './extraction/document-decoder';
export { InventoryTransformer } from './transform/inventory-transformer';
export { InventoryFileWatcher } from './watcher/file-watcher';
export { IngestWorker } from './worker/ingest-worker';
export { enqueueFile, retryJob } from './jobs/job-lifecycle';
export { validateFile, type FileValidationReport } from './jobs/file-validation';
export { getJobStatistics, type JobStatistics } from './jobs/job-statistics';
export { JobLogRecorder } from './logs/job-log-recorder';
export { SupabaseJobStore } from './store/supabase-job-store';
export { createIngestRuntime, toWorkerConfig, type IngestRuntime } from './runtime';

import { config } from 'dotenv';
import { createLogger, loadIngestConfig, setJobLogSink } from '@inventory/core';
import { createIngestRuntime } from './runtime';
import { SupabaseJobStore } from './store/supabase-job-store';

// Load environment variables
config();

const logger = createLogger('ingest-main');

/**
 * Ingest worker: watches the inbox, processes pending jobs, sweeps old ones
 */
async function main() {
  const ingestConfig = loadIngestConfig();
  const runtime = createIngestRuntime(ingestConfig, new SupabaseJobStore());
  setJobLogSink(runtime.logRecorder);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');
    await runtime.watcher.stop();
    await runtime.worker.stop();
    await runtime.logRecorder.flush();
    process.exit(0);
  };

  // Graceful shutdown
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await runtime.watcher.start();
  runtime.worker.start();

  logger.info({
    watchDirectory: ingestConfig.watchDirectory,
    outputDirectory: ingestConfig.outputDirectory,
    exportFormats: ingestConfig.exportFormats
  }, 'Ingest worker running');
}

main().catch((error) => {
  logger.error({ error }, 'Worker crashed');
  process.exit(1);
});

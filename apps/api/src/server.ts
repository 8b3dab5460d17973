// Load environment variables from root .env file
import { config } from 'dotenv';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, '../../../.env') });

import { createLogger, loadIngestConfig, setJobLogSink } from '@inventory/core';
import { createIngestRuntime, SupabaseJobStore } from '@inventory/ingest';
import { createApp } from './app';

const logger = createLogger('api-server');

const port = Number(process.env.PORT || 8000);
const corsOrigins = process.env.CORS_ORIGINS?.split(',').map((origin) => origin.trim());

const runtime = createIngestRuntime(loadIngestConfig(), new SupabaseJobStore());
setJobLogSink(runtime.logRecorder);
const app = createApp(runtime, { corsOrigins });

// Start server
app.listen(port, () => {
  logger.info({ port }, 'API server started');
});

import express, { type Express } from 'express';
import cors from 'cors';
import type { IngestRuntime } from '@inventory/ingest';
import { createFileRouter } from './files/file-routes';
import { createHealthRouter } from './health/health-routes';
import { createJobRouter } from './jobs/job-routes';
import { createStatsRouter } from './stats/stats-routes';

export type AppOptions = {
  corsOrigins?: string[];
};

/**
 * Manual trigger surface over an ingest runtime
 */
export function createApp(runtime: IngestRuntime, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.corsOrigins ?? ['http://localhost:3000'],
    credentials: true
  }));
  app.use(express.json());

  // Routes
  app.use('/jobs', createJobRouter(runtime));
  app.use('/files', createFileRouter(runtime));
  app.use('/stats', createStatsRouter(runtime));
  app.use('/health', createHealthRouter(runtime));

  return app;
}

import { promises as fs } from 'fs';
import * as path from 'path';
import { Router, type Router as ExpressRouter } from 'express';
import { z } from 'zod';
import {
  createLogger,
  jobFilterSchema,
  JobNotFoundError,
  SourceMissingError,
  ValidationError,
  type IngestJob,
  type JobStore
} from '@inventory/core';
import { enqueueFile, isSupportedExtension, retryJob, type IngestRuntime } from '@inventory/ingest';
import { sendRouteError } from '../route-errors';

const logger = createLogger('job-routes');

export const pathBodySchema = z.object({
  path: z.string().trim().min(1)
});

const jobIdSchema = z.string().uuid();

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function assertFileExists(filePath: string): Promise<void> {
  if (!(await isFile(filePath))) {
    throw new SourceMissingError(filePath);
  }
}

/**
 * Ids that are not uuids cannot name a job
 */
function parseJobId(raw: string): string {
  const parsed = jobIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new JobNotFoundError(raw);
  }
  return parsed.data;
}

async function requireJob(store: JobStore, rawId: string): Promise<IngestJob> {
  const id = parseJobId(rawId);
  const job = await store.get(id);
  if (!job) {
    throw new JobNotFoundError(id);
  }
  return job;
}

export function createJobRouter(runtime: IngestRuntime): ExpressRouter {
  const router: ExpressRouter = Router();
  const { store, classifier, worker } = runtime;

  /**
   * POST /jobs
   * Enqueue a file by path
   */
  router.post('/', async (req, res) => {
    try {
      const body = pathBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new ValidationError('Body must contain a non-empty "path"', {
          issues: body.error.issues.map((issue) => issue.message)
        });
      }

      const sourcePath = path.resolve(body.data.path);
      await assertFileExists(sourcePath);

      if (!isSupportedExtension(path.extname(sourcePath))) {
        throw new ValidationError(`Unsupported file format: ${path.extname(sourcePath) || '(none)'}`, {
          sourcePath
        });
      }

      const result = await enqueueFile(store, {
        sourcePath,
        tag: classifier.classify(sourcePath)
      });

      res.status(result.created ? 201 : 200).json(result);
    } catch (error) {
      sendRouteError(res, error, logger, 'Error enqueueing file');
    }
  });

  /**
   * POST /jobs/process
   * Run one processing pass now
   */
  router.post('/process', async (req, res) => {
    try {
      const summary = await worker.runPass();
      const counts = await store.countByStatus();

      res.json({
        processed: summary.claimed,
        completed: summary.completed,
        failed: summary.failed,
        counts
      });
    } catch (error) {
      sendRouteError(res, error, logger, 'Error running processing pass');
    }
  });

  /**
   * GET /jobs
   * List jobs by status/environment/client
   */
  router.get('/', async (req, res) => {
    try {
      const filter = jobFilterSchema.safeParse(req.query);
      if (!filter.success) {
        throw new ValidationError('Invalid job filter', {
          issues: filter.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        });
      }

      const jobs = await store.list(filter.data);
      res.json({ jobs, limit: filter.data.limit, offset: filter.data.offset });
    } catch (error) {
      sendRouteError(res, error, logger, 'Error listing jobs');
    }
  });

  /**
   * GET /jobs/:id
   */
  router.get('/:id', async (req, res) => {
    try {
      res.json(await requireJob(store, req.params.id));
    } catch (error) {
      sendRouteError(res, error, logger, 'Error fetching job');
    }
  });

  /**
   * GET /jobs/:id/logs
   * Processing log of one job, newest first
   */
  router.get('/:id/logs', async (req, res) => {
    try {
      const job = await requireJob(store, req.params.id);
      const logs = await store.listLogs(job.id);
      res.json({ job_id: job.id, logs });
    } catch (error) {
      sendRouteError(res, error, logger, 'Error fetching job logs');
    }
  });

  /**
   * GET /jobs/:id/artifacts/:name
   * Download one of the job's recorded artifacts by file name
   */
  router.get('/:id/artifacts/:name', async (req, res) => {
    try {
      const job = await requireJob(store, req.params.id);
      const artifact = job.artifacts.find((artifactPath) => path.basename(artifactPath) === req.params.name);

      if (!artifact || !(await isFile(artifact))) {
        res.status(404).json({ error: 'Artifact not found' });
        return;
      }

      res.download(artifact, path.basename(artifact), (error) => {
        if (!error) return;
        if (res.headersSent) {
          logger.error({ error, jobId: job.id, artifact }, 'Artifact download interrupted');
          return;
        }
        sendRouteError(res, error, logger, 'Error sending artifact');
      });
    } catch (error) {
      sendRouteError(res, error, logger, 'Error downloading artifact');
    }
  });

  /**
   * POST /jobs/:id/retry
   * Reset a failed job to pending
   */
  router.post('/:id/retry', async (req, res) => {
    try {
      const job = await retryJob(store, parseJobId(req.params.id));
      res.json(job);
    } catch (error) {
      sendRouteError(res, error, logger, 'Error retrying job');
    }
  });

  return router;
}

import { Router, type Router as ExpressRouter } from 'express';
import { createLogger, ValidationError } from '@inventory/core';
import { validateFile, type IngestRuntime } from '@inventory/ingest';
import { pathBodySchema } from '../jobs/job-routes';
import { sendRouteError } from '../route-errors';

const logger = createLogger('file-routes');

export function createFileRouter(runtime: IngestRuntime): ExpressRouter {
  const router: ExpressRouter = Router();

  /**
   * POST /files/validate
   * Dry extraction without creating a job
   */
  router.post('/validate', async (req, res) => {
    try {
      const body = pathBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new ValidationError('Body must contain a non-empty "path"');
      }

      const report = await validateFile(body.data.path, runtime.extractor, runtime.config.maxFileSizeMb);
      res.json(report);
    } catch (error) {
      sendRouteError(res, error, logger, 'Error validating file');
    }
  });

  return router;
}

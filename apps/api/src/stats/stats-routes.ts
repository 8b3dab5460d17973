import { Router, type Router as ExpressRouter } from 'express';
import { createLogger } from '@inventory/core';
import { getJobStatistics, type IngestRuntime } from '@inventory/ingest';
import { sendRouteError } from '../route-errors';

const logger = createLogger('stats-routes');

export function createStatsRouter(runtime: IngestRuntime): ExpressRouter {
  const router: ExpressRouter = Router();

  /**
   * GET /stats
   * Job counts, success rate, 24h activity and per-environment/client totals
   */
  router.get('/', async (req, res) => {
    try {
      res.json(await getJobStatistics(runtime.store));
    } catch (error) {
      sendRouteError(res, error, logger, 'Error computing statistics');
    }
  });

  return router;
}

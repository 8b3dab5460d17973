import { promises as fs, constants } from 'fs';
import { Router, type Router as ExpressRouter } from 'express';
import { createLogger } from '@inventory/core';
import type { IngestRuntime } from '@inventory/ingest';

const logger = createLogger('health-routes');

type CheckResult = { ok: boolean; error?: string };

async function checkDirectory(directory: string): Promise<CheckResult> {
  try {
    await fs.access(directory, constants.R_OK | constants.W_OK);
    return { ok: true };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function createHealthRouter(runtime: IngestRuntime): ExpressRouter {
  const router: ExpressRouter = Router();

  /**
   * GET /health
   * Store reachability and directory access
   */
  router.get('/', async (req, res) => {
    let store: CheckResult;
    try {
      await runtime.store.ping();
      store = { ok: true };
    } catch (error) {
      logger.error({ error }, 'Job store unreachable');
      store = { ok: false, error: error instanceof Error ? error.message : String(error) };
    }

    const checks = {
      store,
      watchDirectory: await checkDirectory(runtime.config.watchDirectory),
      outputDirectory: await checkDirectory(runtime.config.outputDirectory)
    };
    const healthy = Object.values(checks).every((check) => check.ok);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      checks,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}

import type { Response } from 'express';
import { BaseError, type Logger } from '@inventory/core';

/**
 * Map a thrown error to a JSON response. Typed errors keep their status.
 */
export function sendRouteError(res: Response, error: unknown, logger: Logger, message: string): void {
  if (error instanceof BaseError) {
    if (error.statusCode >= 500) {
      logger.error({ error }, message);
    } else {
      logger.warn({ code: error.code, context: error.context }, error.message);
    }
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  logger.error({ error }, message);
  res.status(500).json({ error: 'Internal server error' });
}

import { BaseError } from './base.error';

/**
 * Relocation error - processed source could not be moved aside
 */
export class RelocationError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RELOCATION_ERROR', 500, context);
  }
}

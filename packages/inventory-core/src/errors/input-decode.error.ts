import { BaseError } from './base.error';

/**
 * Input decode error - source file unreadable or not valid JSON/YAML
 */
export class InputDecodeError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INPUT_DECODE_ERROR', 422, context);
  }
}

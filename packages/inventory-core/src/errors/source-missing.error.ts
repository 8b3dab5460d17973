import { BaseError } from './base.error';

/**
 * Source missing error - file vanished between enqueue and claim
 */
export class SourceMissingError extends BaseError {
  constructor(sourcePath: string) {
    super(`File not found: ${sourcePath}`, 'SOURCE_MISSING', 404, { sourcePath });
  }
}

import { BaseError } from './base.error';

/**
 * Export write error - an artifact could not be written.
 * `writtenPaths` lists the artifacts produced before the failure.
 */
export class ExportWriteError extends BaseError {
  readonly writtenPaths: string[];

  constructor(message: string, writtenPaths: string[], context?: Record<string, unknown>) {
    super(message, 'EXPORT_WRITE_ERROR', 500, { ...context, writtenPaths });
    this.writtenPaths = writtenPaths;
  }
}

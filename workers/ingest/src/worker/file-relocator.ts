import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger, formatFileTimestamp, RelocationError } from '@inventory/core';
import { jobRef } from '../export/file-naming';

const logger = createLogger('file-relocator');

/**
 * Moves processed sources to `{processedDirectory}/{yyyyMMdd_HHmmss}_{jobRef}_{name}`
 */
export class FileRelocator {
  private readonly now: () => Date;

  constructor(private readonly processedDirectory: string, now?: () => Date) {
    this.now = now ?? (() => new Date());
  }

  targetPath(sourcePath: string, jobId: string): string {
    return path.join(
      this.processedDirectory,
      `${formatFileTimestamp(this.now())}_${jobRef(jobId)}_${path.basename(sourcePath)}`
    );
  }

  async relocate(sourcePath: string, jobId: string): Promise<string> {
    const target = this.targetPath(sourcePath, jobId);

    try {
      await fs.mkdir(this.processedDirectory, { recursive: true });
      await this.move(sourcePath, target);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RelocationError(`Cannot move ${sourcePath}: ${reason}`, { sourcePath, target });
    }

    logger.info({ jobId, sourcePath, target }, 'Source relocated');
    return target;
  }

  private async move(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (error) {
      // rename cannot cross filesystems
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        await fs.copyFile(from, to);
        await fs.unlink(from);
        return;
      }
      throw error;
    }
  }
}

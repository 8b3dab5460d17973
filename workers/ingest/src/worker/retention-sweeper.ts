import { promises as fs } from 'fs';
import {
  createLogger,
  logJobEvent,
  retentionCutoff,
  type IngestJob,
  type JobStore
} from '@inventory/core';

const logger = createLogger('retention-sweeper');

export type SweepSummary = {
  deleted: number;
  artifactsRemoved: number;
  artifactFailures: number;
  logsDeleted: number;
};

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

/**
 * Deletes terminal jobs older than the retention window, with their artifacts,
 * and job log entries older than the same window
 */
export class RetentionSweeper {
  private readonly now: () => Date;

  constructor(
    private readonly store: JobStore,
    private readonly retentionDays: number,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  async sweep(): Promise<SweepSummary> {
    const cutoff = retentionCutoff(this.retentionDays, this.now());
    const jobs = await this.store.listTerminalBefore(cutoff);
    const summary: SweepSummary = { deleted: 0, artifactsRemoved: 0, artifactFailures: 0, logsDeleted: 0 };

    for (const job of jobs) {
      await this.removeArtifacts(job, summary);

      try {
        if (await this.store.delete(job.id)) {
          summary.deleted++;
          logJobEvent(logger, 'job.deleted', job, { completedAt: job.completed_at });
        }
      } catch (error) {
        logger.error({ error, jobId: job.id }, 'Failed to delete job');
      }
    }

    try {
      summary.logsDeleted = await this.store.deleteLogsBefore(cutoff);
    } catch (error) {
      logger.error({ error }, 'Failed to prune job logs');
    }

    if (jobs.length > 0 || summary.logsDeleted > 0) {
      logger.info({ cutoff: cutoff.toISOString(), ...summary }, 'Retention sweep finished');
    }

    return summary;
  }

  private async removeArtifacts(job: IngestJob, summary: SweepSummary): Promise<void> {
    for (const artifact of job.artifacts) {
      try {
        await fs.unlink(artifact);
        summary.artifactsRemoved++;
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          logger.debug({ jobId: job.id, artifact }, 'Artifact already gone');
          continue;
        }
        summary.artifactFailures++;
        logger.warn({ error, jobId: job.id, artifact }, 'Failed to delete artifact');
      }
    }
  }
}

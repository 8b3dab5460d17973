import { createLogger, type Logger, type PassSummary, type WorkerConfig } from '@inventory/core';

function emptySummary(): PassSummary {
  return { claimed: 0, completed: 0, failed: 0 };
}

/**
 * Base worker with batch claiming, sequential processing and timer lifecycle.
 * Subclasses supply the claim, the per-job work and the terminal writes.
 */
export abstract class BaseWorker<TJob, TResult> {
  protected config: WorkerConfig;
  protected running: boolean = false;
  protected readonly logger: Logger;
  // Set by stop(); a stopped worker starts no pass or sweep until start() again
  private stopped: boolean = false;
  private timers: NodeJS.Timeout[] = [];
  private startupInFlight: Promise<void> | null = null;
  private passInFlight: Promise<PassSummary> | null = null;
  private maintenanceInFlight: Promise<void> | null = null;

  constructor(config: WorkerConfig) {
    this.config = config;
    this.logger = createLogger(config.workerType, { instanceId: config.instanceId });
    this.logger.info({ config }, 'Worker initialized');
  }

  /**
   * Start timers: processing interval, cleanup interval and the one-shot startup scan
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopped = false;

    this.logger.info({ workerType: this.config.workerType }, 'Worker starting');

    this.timers.push(
      setTimeout(() => {
        this.startupInFlight = this.startupThenPass().finally(() => {
          this.startupInFlight = null;
        });
      }, this.config.startupScanDelayMs),
      setInterval(() => void this.runPass(), this.config.processingIntervalMs),
      setInterval(() => void this.runMaintenance(), this.config.cleanupIntervalMs)
    );
  }

  /**
   * Stop worker gracefully: no new passes, in-flight work (startup scan included) finishes
   */
  async stop(): Promise<void> {
    this.logger.info('Worker stopping');
    this.running = false;
    this.stopped = true;

    for (const timer of this.timers) {
      clearTimeout(timer);
      clearInterval(timer);
    }
    this.timers = [];

    await Promise.all([this.startupInFlight, this.passInFlight, this.maintenanceInFlight]);

    this.logger.info('Worker stopped');
  }

  /**
   * Run one processing pass. A pass already running is joined.
   * Callable without start(); after stop() it claims nothing.
   */
  runPass(): Promise<PassSummary> {
    if (this.stopped) {
      return Promise.resolve(emptySummary());
    }
    if (!this.passInFlight) {
      this.passInFlight = this.executePass().finally(() => {
        this.passInFlight = null;
      });
    }
    return this.passInFlight;
  }

  /**
   * Run the periodic maintenance task. Errors are logged.
   */
  runMaintenance(): Promise<void> {
    if (this.stopped) {
      return Promise.resolve();
    }
    if (!this.maintenanceInFlight) {
      this.maintenanceInFlight = this.maintain()
        .catch((error) => {
          this.logger.error({ error }, 'Maintenance failed');
        })
        .finally(() => {
          this.maintenanceInFlight = null;
        });
    }
    return this.maintenanceInFlight;
  }

  private async startupThenPass(): Promise<void> {
    try {
      await this.onStartup();
    } catch (error) {
      this.logger.error({ error }, 'Startup task failed');
    }
    if (this.stopped) return;
    await this.runPass();
  }

  private async executePass(): Promise<PassSummary> {
    const summary = emptySummary();

    let jobs: TJob[];
    try {
      jobs = await this.claimJobs(this.config.batchSize);
    } catch (error) {
      this.logger.error({ error }, 'Failed to claim jobs');
      return summary;
    }

    summary.claimed = jobs.length;
    if (jobs.length === 0) {
      return summary;
    }

    this.logger.info({ count: jobs.length }, 'Jobs claimed');

    for (const job of jobs) {
      if (await this.processJob(job)) {
        summary.completed++;
      } else {
        summary.failed++;
      }
    }

    this.logger.info(summary, 'Pass finished');
    return summary;
  }

  /**
   * Process a single job. Returns true when it completed.
   */
  private async processJob(job: TJob): Promise<boolean> {
    const startTime = Date.now();

    let result: TResult;
    try {
      result = await this.handleJob(job);
    } catch (error) {
      await this.settleFailure(job, error, Date.now() - startTime);
      return false;
    }

    try {
      await this.completeJob(job, result, Date.now() - startTime);
      return true;
    } catch (error) {
      await this.settleFailure(job, error, Date.now() - startTime);
      return false;
    }
  }

  private async settleFailure(job: TJob, error: unknown, duration: number): Promise<void> {
    try {
      await this.failJob(job, error, duration);
    } catch (failError) {
      this.logger.error({ error: failError, cause: error }, 'Failed to record job failure');
    }
  }

  protected abstract claimJobs(limit: number): Promise<TJob[]>;
  protected abstract handleJob(job: TJob): Promise<TResult>;
  protected abstract completeJob(job: TJob, result: TResult, duration: number): Promise<void>;
  protected abstract failJob(job: TJob, error: unknown, duration: number): Promise<void>;

  /** One-shot task run before the first pass */
  protected async onStartup(): Promise<void> {}

  /** Periodic task on the cleanup interval */
  protected async maintain(): Promise<void> {}
}

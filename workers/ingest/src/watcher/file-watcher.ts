import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import { watch, type FSWatcher } from 'chokidar';
import { createLogger, type JobStore } from '@inventory/core';
import type { EnvironmentClassifier } from '../classification/environment-classifier';
import { fileExtension, isSupportedExtension } from '../extraction/document-decoder';
import { enqueueFile } from '../jobs/job-lifecycle';

const logger = createLogger('file-watcher');

const BYTES_PER_MB = 1024 * 1024;

export type FileWatcherOptions = {
  store: JobStore;
  classifier: EnvironmentClassifier;
  watchDirectory: string;
  maxFileSizeMb: number;
  settleDelayMs: number;
};

export type IntakeCheck =
  | { accepted: true; sizeBytes: number }
  | { accepted: false; reason: 'unsupported_extension' | 'too_large' | 'not_a_file'; sizeBytes?: number };

/**
 * Turns file arrivals under the watch root into pending jobs.
 * Never modifies the files it sees.
 */
export class InventoryFileWatcher {
  private watcher: FSWatcher | null = null;
  private readonly pendingTimers = new Map<string, NodeJS.Timeout>();
  private readonly root: string;

  constructor(private readonly options: FileWatcherOptions) {
    this.root = path.resolve(options.watchDirectory);
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    await fs.mkdir(this.root, { recursive: true });

    const watcher = watch(this.root, {
      ignoreInitial: true,
      persistent: true,
      depth: Infinity
    });

    watcher.on('add', (filePath: string) => {
      void this.handleFileEvent(filePath);
    });

    watcher.on('error', (error: unknown) => {
      logger.error({ error }, 'Watcher error');
    });

    this.watcher = watcher;

    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });
    logger.info({ watchRoot: this.root }, 'File watcher initialised');
  }

  async stop(): Promise<void> {
    for (const timer of this.pendingTimers.values()) {
      clearTimeout(timer);
    }
    this.pendingTimers.clear();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
      logger.info('File watcher stopped');
    }
  }

  get pendingCount(): number {
    return this.pendingTimers.size;
  }

  /**
   * Extension and size gate shared by events, the startup scan and validation
   */
  async checkIntake(filePath: string): Promise<IntakeCheck> {
    if (!isSupportedExtension(fileExtension(filePath))) {
      return { accepted: false, reason: 'unsupported_extension' };
    }

    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return { accepted: false, reason: 'not_a_file' };
    }

    if (stats.size > this.options.maxFileSizeMb * BYTES_PER_MB) {
      return { accepted: false, reason: 'too_large', sizeBytes: stats.size };
    }

    return { accepted: true, sizeBytes: stats.size };
  }

  /**
   * Gate one file event and schedule its enqueue after the settle delay.
   * A repeated event for the same path restarts the delay.
   * Returns whether the file was scheduled.
   */
  async handleFileEvent(filePath: string): Promise<boolean> {
    const absolutePath = path.resolve(filePath);

    let check: IntakeCheck;
    try {
      check = await this.checkIntake(absolutePath);
    } catch (error) {
      logger.warn({ error, filePath: absolutePath }, 'Cannot inspect new file');
      return false;
    }

    if (!check.accepted) {
      if (check.reason === 'too_large') {
        logger.warn({
          filePath: absolutePath,
          sizeMb: Number(((check.sizeBytes ?? 0) / BYTES_PER_MB).toFixed(2)),
          maxFileSizeMb: this.options.maxFileSizeMb
        }, 'File exceeds size limit, ignoring');
      } else {
        logger.debug({ filePath: absolutePath, reason: check.reason }, 'Ignoring file');
      }
      return false;
    }

    const existing = this.pendingTimers.get(absolutePath);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.pendingTimers.delete(absolutePath);
      void this.enqueue(absolutePath);
    }, this.options.settleDelayMs);
    this.pendingTimers.set(absolutePath, timer);

    return true;
  }

  /**
   * Enqueue every acceptable file under the root that no job row knows about
   */
  async scanExisting(): Promise<number> {
    let enqueued = 0;

    for (const filePath of await this.walk(this.root)) {
      let check: IntakeCheck;
      try {
        check = await this.checkIntake(filePath);
      } catch (error) {
        logger.warn({ error, filePath }, 'Cannot inspect existing file');
        continue;
      }
      if (!check.accepted) continue;

      if (await this.options.store.findByPath(filePath)) continue;

      if (await this.enqueue(filePath)) {
        enqueued++;
      }
    }

    logger.info({ watchRoot: this.root, enqueued }, 'Existing files scanned');
    return enqueued;
  }

  private async enqueue(filePath: string): Promise<boolean> {
    try {
      const tag = this.options.classifier.classify(filePath);
      const { created } = await enqueueFile(this.options.store, { sourcePath: filePath, tag });
      return created;
    } catch (error) {
      logger.error({ error, filePath }, 'Failed to enqueue file');
      return false;
    }
  }

  private async walk(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      logger.warn({ error, directory }, 'Cannot read directory');
      return [];
    }

    const files: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(entryPath)));
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }
    return files.sort();
  }
}

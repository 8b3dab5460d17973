import { promises as fs } from 'fs';
import {
  createLogger,
  SourceMissingError,
  type IngestJob,
  type JobOutcome,
  type JobStore
} from '@inventory/core';
import { readDocument } from '../extraction/document-decoder';
import type { InventoryExtractor } from '../extraction/extractor';
import type { InventoryTransformer } from '../transform/inventory-transformer';

const logger = createLogger('ingest-job-handler');

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (error) {
    logger.debug({ error, filePath }, 'Source not accessible');
    return false;
  }
}

/**
 * Processes one claimed job: read → decode → extract → transform/export
 */
export class IngestJobHandler {
  constructor(
    private readonly store: JobStore,
    private readonly extractor: InventoryExtractor,
    private readonly transformer: InventoryTransformer
  ) {}

  async handle(job: IngestJob): Promise<JobOutcome> {
    logger.info({ jobId: job.id, sourcePath: job.source_path }, 'Processing inventory file');

    // 1. Source still there
    if (!(await isFile(job.source_path))) {
      throw new SourceMissingError(job.source_path);
    }

    // 2. Decode and extract
    const document = await readDocument(job.source_path);
    const extracted = this.extractor.extract(document);

    logger.info({
      jobId: job.id,
      shape: extracted.metadata.shape,
      vms: extracted.metadata.total_vms,
      alarms: extracted.metadata.total_alarms,
      skipped: extracted.metadata.skipped_entries
    }, 'Records extracted');

    // 3. Persist counts before export
    await this.store.update(job.id, {
      vm_count: extracted.vms.length,
      alarm_count: extracted.alarms.length
    });

    // 4. Clean, tag, export
    const { artifacts, tags } = await this.transformer.process(extracted, job);

    return {
      artifacts,
      vmCount: extracted.vms.length,
      alarmCount: extracted.alarms.length,
      tags
    };
  }
}

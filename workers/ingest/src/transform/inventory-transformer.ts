import { promises as fs } from 'fs';
import * as path from 'path';
import {
  createLogger,
  DATA_SOURCE,
  ExportWriteError,
  type EnvironmentTag,
  type ExportFormat,
  type ExtractionResult,
  type IngestJob,
  type RowTags,
  type TaggedAlarmRow,
  type TaggedVmRow
} from '@inventory/core';
import type { EnvironmentClassifier } from '../classification/environment-classifier';
import { ArtifactExporter } from '../export/artifact-exporter';
import { ALARM_COLUMNS, VM_COLUMNS, toTable } from '../export/columns';
import { buildBaseName, buildSummaryName } from '../export/file-naming';
import { writeJson } from '../export/json-writer';
import { cleanAlarm } from './alarm-cleaner';
import { partitionByEnvironment, singleGroup, type ExportGroup } from './partition';
import { buildSummary } from './summary';
import { cleanVm } from './vm-cleaner';

const logger = createLogger('inventory-transformer');

export type TransformerOptions = {
  outputDirectory: string;
  exportFormats: readonly ExportFormat[];
  separateByEnvironment: boolean;
  classifier: EnvironmentClassifier;
  now?: () => Date;
};

export type TransformOutcome = {
  artifacts: string[];
  tags: EnvironmentTag;
};

/**
 * Clean, enrich, partition and export one job's extracted records
 */
export class InventoryTransformer {
  private readonly exporter: ArtifactExporter;
  private readonly now: () => Date;

  constructor(private readonly options: TransformerOptions) {
    this.exporter = new ArtifactExporter(options.outputDirectory, options.exportFormats);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Job tags win field by field; the path classification fills the gaps
   */
  resolveTags(job: Pick<IngestJob, 'source_path' | 'environment' | 'client' | 'datacenter'>): EnvironmentTag {
    if (job.environment !== null && job.client !== null && job.datacenter !== null) {
      return { environment: job.environment, client: job.client, datacenter: job.datacenter };
    }

    const classified = this.options.classifier.classify(job.source_path);
    return {
      environment: job.environment ?? classified.environment,
      client: job.client ?? classified.client,
      datacenter: job.datacenter ?? classified.datacenter
    };
  }

  async process(extracted: ExtractionResult, job: IngestJob): Promise<TransformOutcome> {
    const processedAt = this.now();
    const tags = this.resolveTags(job);
    const rowTags: RowTags = {
      environment: tags.environment,
      client: tags.client,
      datacenter: tags.datacenter,
      job_id: job.id,
      processed_at: processedAt,
      data_source: DATA_SOURCE
    };

    const vms: TaggedVmRow[] = extracted.vms.map((vm) => ({ ...cleanVm(vm), ...rowTags }));
    const alarms: TaggedAlarmRow[] = extracted.alarms.map((alarm) => ({
      ...cleanAlarm(alarm, processedAt),
      ...rowTags
    }));

    const groups: ExportGroup[] = this.options.separateByEnvironment
      ? partitionByEnvironment(vms, alarms)
      : singleGroup(vms, alarms, tags.environment, tags.client);

    const written: string[] = [];

    try {
      await fs.mkdir(this.options.outputDirectory, { recursive: true });

      for (const group of groups) {
        await this.exportGroup(group, job.id, processedAt, written);
      }

      const summaryPath = path.join(this.options.outputDirectory, buildSummaryName(processedAt, job.id));
      await writeJson(
        summaryPath,
        buildSummary({
          jobId: job.id,
          sourcePath: job.source_path,
          processedAt,
          tags,
          vms,
          alarms,
          metadata: extracted.metadata
        })
      );
      written.push(summaryPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExportWriteError(`Export failed for job ${job.id}: ${reason}`, [...written], {
        jobId: job.id
      });
    }

    logger.info({
      jobId: job.id,
      groups: groups.length,
      artifacts: written.length
    }, 'Artifacts written');

    return { artifacts: written, tags };
  }

  private async exportGroup(
    group: ExportGroup,
    jobId: string,
    timestamp: Date,
    written: string[]
  ): Promise<void> {
    if (group.vms.length > 0) {
      await this.exporter.exportTable(
        buildBaseName({ kind: 'vms', client: group.client, environment: group.environment, timestamp, jobId }),
        'VM_Details',
        toTable(group.vms, VM_COLUMNS),
        written
      );
    }

    if (group.alarms.length > 0) {
      await this.exporter.exportTable(
        buildBaseName({ kind: 'alarms', client: group.client, environment: group.environment, timestamp, jobId }),
        'VM_Alarms',
        toTable(group.alarms, ALARM_COLUMNS),
        written
      );
    }
  }
}

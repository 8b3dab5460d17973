import { z } from 'zod';

/**
 * Raw numeric as found in the source - coerced later during cleaning
 */
export const rawNumericSchema = z.union([z.number(), z.string()]).nullable();

export type RawNumeric = z.infer<typeof rawNumericSchema>;

/**
 * VM record as produced by extraction
 */
export const extractedVmSchema = z.object({
  name: z.string(),
  uuid: z.string().nullable(),
  power_state: z.string(),
  cpu_count: rawNumericSchema,
  memory_mb: rawNumericSchema,
  disk_gb: rawNumericSchema,
  network_count: rawNumericSchema,
  guest_os: z.string().nullable(),
  host_name: z.string().nullable(),
  cluster_name: z.string().nullable(),
  datacenter_name: z.string().nullable()
});

export type ExtractedVm = z.infer<typeof extractedVmSchema>;

/**
 * Alarm record as produced by extraction
 */
export const extractedAlarmSchema = z.object({
  name: z.string(),
  description: z.string(),
  severity: z.string(),
  status: z.string(),
  vm_name: z.string(),
  triggered_time: z.date().nullable(),
  acknowledged: z.union([z.boolean(), z.number(), z.string()])
});

export type ExtractedAlarm = z.infer<typeof extractedAlarmSchema>;

export const documentShapeEnum = z.enum(['playbook', 'results', 'facts', 'direct']);

export type DocumentShape = z.infer<typeof documentShapeEnum>;

export const extractionMetadataSchema = z.object({
  shape: documentShapeEnum,
  parsed_at: z.string().datetime({ offset: true }),
  total_vms: z.number().int().nonnegative(),
  total_alarms: z.number().int().nonnegative(),
  skipped_entries: z.number().int().nonnegative()
});

export type ExtractionMetadata = z.infer<typeof extractionMetadataSchema>;

export type ExtractionResult = {
  vms: ExtractedVm[];
  alarms: ExtractedAlarm[];
  metadata: ExtractionMetadata;
};

export const resourceCategoryEnum = z.enum(['Low', 'Medium', 'High', 'Critical']);

export type ResourceCategory = z.infer<typeof resourceCategoryEnum>;

export const severityLevelEnum = z.enum(['Critical', 'Warning', 'Information', 'Normal', 'Unknown']);

export type SeverityLevel = z.infer<typeof severityLevelEnum>;

/**
 * Columns attached to every exported row
 */
export type RowTags = {
  environment: string | null;
  client: string | null;
  datacenter: string | null;
  job_id: string;
  processed_at: Date;
  data_source: string;
};

/**
 * Cleaned VM row - every numeric is a finite number
 */
export type VmRow = {
  name: string;
  uuid: string | null;
  power_state: string;
  cpu_count: number;
  memory_mb: number;
  disk_gb: number;
  network_count: number;
  guest_os: string | null;
  host_name: string | null;
  cluster_name: string | null;
  datacenter_name: string | null;
  memory_gb: number;
  cpu_memory_ratio: number;
  resource_score: number;
  is_powered_on: boolean;
  resource_category: ResourceCategory;
};

/**
 * Cleaned alarm row
 */
export type AlarmRow = {
  name: string;
  description: string;
  severity: string;
  status: string;
  vm_name: string;
  triggered_time: Date | null;
  acknowledged: boolean;
  severity_normalized: SeverityLevel;
  priority_score: number;
  days_since_triggered: number | null;
};

export type TaggedVmRow = VmRow & RowTags;
export type TaggedAlarmRow = AlarmRow & RowTags;

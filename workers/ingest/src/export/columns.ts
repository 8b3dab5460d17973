import type { TaggedAlarmRow, TaggedVmRow } from '@inventory/core';

export const VM_COLUMNS = [
  'name',
  'uuid',
  'power_state',
  'cpu_count',
  'memory_mb',
  'memory_gb',
  'disk_gb',
  'network_count',
  'guest_os',
  'host_name',
  'cluster_name',
  'datacenter_name',
  'cpu_memory_ratio',
  'resource_score',
  'resource_category',
  'is_powered_on',
  'environment',
  'client',
  'datacenter',
  'job_id',
  'processed_at',
  'data_source'
] as const satisfies readonly (keyof TaggedVmRow)[];

export const ALARM_COLUMNS = [
  'name',
  'description',
  'severity',
  'severity_normalized',
  'priority_score',
  'status',
  'vm_name',
  'triggered_time',
  'days_since_triggered',
  'acknowledged',
  'environment',
  'client',
  'datacenter',
  'job_id',
  'processed_at',
  'data_source'
] as const satisfies readonly (keyof TaggedAlarmRow)[];

export type CellValue = string | number | boolean | Date | null;

/**
 * A collection ready for writing: ordered columns and rows keyed by them
 */
export type Table = {
  columns: readonly string[];
  rows: Array<Record<string, CellValue>>;
};

export function toTable<T extends Record<K, CellValue>, K extends string>(
  rows: T[],
  columns: readonly K[]
): Table {
  return {
    columns,
    rows: rows.map((row) => {
      const record: Record<string, CellValue> = {};
      for (const column of columns) {
        record[column] = row[column];
      }
      return record;
    })
  };
}

/**
 * Plain text of a cell as it appears in text encodings
 */
export function cellText(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

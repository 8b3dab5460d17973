import {
  SUMMARY_TOP_GUEST_OS,
  type EnvironmentTag,
  type ExtractionMetadata,
  type ResourceCategory,
  type SeverityLevel,
  type TaggedAlarmRow,
  type TaggedVmRow
} from '@inventory/core';
import { round2 } from './coerce';

export type VmStatistics = {
  total_count: number;
  power_state_distribution: Record<string, number>;
  resource_category_distribution: Partial<Record<ResourceCategory, number>>;
  average_cpu_count: number;
  average_memory_gb: number;
  total_disk_gb: number;
  guest_os_distribution: Record<string, number>;
};

export type AlarmStatistics = {
  total_count: number;
  severity_distribution: Partial<Record<SeverityLevel, number>>;
  acknowledged_count: number;
  unacknowledged_count: number;
  unique_vms_with_alarms: number;
};

export type ProcessingSummary = {
  processing_summary: {
    job_id: string;
    source_path: string;
    processed_at: string;
    total_vms: number;
    total_alarms: number;
    environment: string;
    client: string;
    datacenter: string;
  };
  vm_statistics: VmStatistics | null;
  alarm_statistics: AlarmStatistics | null;
  metadata: ExtractionMetadata;
};

/**
 * Occurrence counts, most frequent first; ties keep first-seen order
 */
export function countValues<T extends string>(values: Iterable<T>, limit?: number): Record<string, number> {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return Object.fromEntries(limit === undefined ? ranked : ranked.slice(0, limit));
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function calculateVmStatistics(vms: TaggedVmRow[]): VmStatistics | null {
  if (vms.length === 0) return null;

  const guestOperatingSystems = vms
    .map((vm) => vm.guest_os)
    .filter((guestOs): guestOs is string => guestOs !== null);

  return {
    total_count: vms.length,
    power_state_distribution: countValues(vms.map((vm) => vm.power_state)),
    resource_category_distribution: countValues(vms.map((vm) => vm.resource_category)),
    average_cpu_count: round2(mean(vms.map((vm) => vm.cpu_count))),
    average_memory_gb: round2(mean(vms.map((vm) => vm.memory_mb / 1024))),
    total_disk_gb: round2(vms.reduce((sum, vm) => sum + vm.disk_gb, 0)),
    guest_os_distribution: countValues(guestOperatingSystems, SUMMARY_TOP_GUEST_OS)
  };
}

export function calculateAlarmStatistics(alarms: TaggedAlarmRow[]): AlarmStatistics | null {
  if (alarms.length === 0) return null;

  const acknowledged = alarms.filter((alarm) => alarm.acknowledged).length;

  return {
    total_count: alarms.length,
    severity_distribution: countValues(alarms.map((alarm) => alarm.severity_normalized)),
    acknowledged_count: acknowledged,
    unacknowledged_count: alarms.length - acknowledged,
    unique_vms_with_alarms: new Set(alarms.map((alarm) => alarm.vm_name)).size
  };
}

export function buildSummary(input: {
  jobId: string;
  sourcePath: string;
  processedAt: Date;
  tags: EnvironmentTag;
  vms: TaggedVmRow[];
  alarms: TaggedAlarmRow[];
  metadata: ExtractionMetadata;
}): ProcessingSummary {
  return {
    processing_summary: {
      job_id: input.jobId,
      source_path: input.sourcePath,
      processed_at: input.processedAt.toISOString(),
      total_vms: input.vms.length,
      total_alarms: input.alarms.length,
      environment: input.tags.environment,
      client: input.tags.client,
      datacenter: input.tags.datacenter
    },
    vm_statistics: calculateVmStatistics(input.vms),
    alarm_statistics: calculateAlarmStatistics(input.alarms),
    metadata: input.metadata
  };
}

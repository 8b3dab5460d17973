import type { ExtractedVm, ResourceCategory, VmRow } from '@inventory/core';
import { coerceFloat, coerceInteger, coerceText, round2 } from './coerce';

const SCORE_WEIGHTS = { cpu: 0.3, memoryGb: 0.4, diskGb: 0.3 } as const;

/**
 * Lower bounds, highest first. Each band is closed-open.
 */
const CATEGORY_THRESHOLDS: ReadonlyArray<{ min: number; category: ResourceCategory }> = [
  { min: 100, category: 'Critical' },
  { min: 50, category: 'High' },
  { min: 10, category: 'Medium' }
];

export function categorizeResourceScore(score: number): ResourceCategory {
  const band = CATEGORY_THRESHOLDS.find((threshold) => score >= threshold.min);
  return band?.category ?? 'Low';
}

/**
 * Fill defaults, coerce numerics and derive resource metrics
 */
export function cleanVm(vm: ExtractedVm): VmRow {
  const cpuCount = coerceInteger(vm.cpu_count);
  const memoryMb = coerceInteger(vm.memory_mb);
  const diskGb = coerceFloat(vm.disk_gb);
  const powerState = coerceText(vm.power_state, 'unknown');

  const memoryGb = round2(memoryMb / 1024);
  const resourceScore = round2(
    cpuCount * SCORE_WEIGHTS.cpu + memoryGb * SCORE_WEIGHTS.memoryGb + diskGb * SCORE_WEIGHTS.diskGb
  );

  return {
    name: coerceText(vm.name, 'Unknown VM'),
    uuid: vm.uuid,
    power_state: powerState,
    cpu_count: cpuCount,
    memory_mb: memoryMb,
    disk_gb: diskGb,
    network_count: coerceInteger(vm.network_count),
    guest_os: vm.guest_os,
    host_name: vm.host_name,
    cluster_name: vm.cluster_name,
    datacenter_name: vm.datacenter_name,
    memory_gb: memoryGb,
    cpu_memory_ratio: round2(memoryGb / Math.max(cpuCount, 1)),
    resource_score: resourceScore,
    is_powered_on: powerState.toLowerCase() === 'poweredon',
    resource_category: categorizeResourceScore(resourceScore)
  };
}

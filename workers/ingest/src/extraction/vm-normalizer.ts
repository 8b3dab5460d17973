import type { ExtractedVm } from '@inventory/core';
import { isRecord, pickNumeric, pickString, type JsonRecord } from './field-resolver';

const KB_PER_GB = 1024 * 1024;

export const VM_ALIASES = {
  name: ['name', 'vm_name', 'guest_name'],
  uuid: ['uuid', 'instance_uuid', 'vm_uuid'],
  powerState: ['power_state', 'runtime.powerState'],
  cpuCount: ['num_cpu', 'cpu_count', 'config.hardware.numCPU'],
  memoryMb: ['memory_mb', 'memory_size_mb', 'config.hardware.memoryMB'],
  diskGb: ['disk_gb', 'disk_size_gb'],
  networkCount: ['network_count'],
  guestOs: ['guest_fullname', 'guest_os', 'config.guestFullName'],
  hostName: ['host_name', 'runtime.host'],
  clusterName: ['cluster_name', 'cluster'],
  datacenterName: ['datacenter_name', 'datacenter']
} as const;

/**
 * Total size of a `disk` list in GB, or null when nothing adds up
 */
function sumDiskGb(disks: unknown): number | null {
  if (!Array.isArray(disks)) return null;

  let totalKb = 0;
  for (const disk of disks) {
    if (!isRecord(disk)) continue;
    const size = Number(disk.size_kb);
    if (Number.isFinite(size)) totalKb += size;
  }
  return totalKb > 0 ? totalKb / KB_PER_GB : null;
}

/**
 * Normalize one VM object into the canonical extracted shape
 */
export function normalizeVm(source: JsonRecord): ExtractedVm {
  const powerState = pickString(source, VM_ALIASES.powerState);

  let networkCount = pickNumeric(source, VM_ALIASES.networkCount);
  if (networkCount === null && Array.isArray(source.networks)) {
    networkCount = source.networks.length;
  }

  return {
    name: pickString(source, VM_ALIASES.name) ?? 'Unknown',
    uuid: pickString(source, VM_ALIASES.uuid),
    power_state: powerState ? powerState.toLowerCase() : 'unknown',
    cpu_count: pickNumeric(source, VM_ALIASES.cpuCount),
    memory_mb: pickNumeric(source, VM_ALIASES.memoryMb),
    disk_gb: pickNumeric(source, VM_ALIASES.diskGb) ?? sumDiskGb(source.disk),
    network_count: networkCount,
    guest_os: pickString(source, VM_ALIASES.guestOs),
    host_name: pickString(source, VM_ALIASES.hostName),
    cluster_name: pickString(source, VM_ALIASES.clusterName),
    datacenter_name: pickString(source, VM_ALIASES.datacenterName)
  };
}

import type { ExtractedAlarm, ExtractedVm, ExtractionResult } from '@inventory/core';
import { normalizeAlarm } from './alarm-normalizer';
import { isRecord, type JsonRecord } from './field-resolver';
import { resolveLeaves } from './shape-dispatcher';
import { normalizeVm } from './vm-normalizer';

/**
 * Container keys checked in order; the first present key wins
 */
export const VM_CONTAINER_KEYS = [
  'vm_info',
  'virtual_machines',
  'vms',
  'instances',
  'vm_facts',
  'vmware_vm_info',
  'vcenter_vm_info'
] as const;

export const ALARM_CONTAINER_KEYS = [
  'alarms',
  'vm_alarms',
  'alerts',
  'events',
  'alarm_info',
  'vmware_alarms'
] as const;

/**
 * Any of these on a leaf means the leaf is itself a VM
 */
export const VM_INDICATOR_KEYS = [
  'name',
  'uuid',
  'instance_uuid',
  'power_state',
  'num_cpu',
  'memory_mb',
  'guest_fullname'
] as const;

type ScanSink = {
  vms: ExtractedVm[];
  alarms: ExtractedAlarm[];
  skipped: number;
};

function firstPresentKey(leaf: JsonRecord, keys: readonly string[]): string | undefined {
  return keys.find((key) => key in leaf);
}

function withDefaultName(entry: JsonRecord, key: string): JsonRecord {
  return 'name' in entry ? entry : { ...entry, name: key };
}

export type ExtractorOptions = {
  now?: () => Date;
};

/**
 * Recovers VM and alarm records from documents of unknown nesting.
 * Pure: works on decoded data only.
 */
export class InventoryExtractor {
  private readonly now: () => Date;

  constructor(options: ExtractorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Extract every VM and alarm record from a decoded document
   */
  extract(document: unknown): ExtractionResult {
    const parsedAt = this.now();
    const { shape, leaves, skipped } = resolveLeaves(document);
    const sink: ScanSink = { vms: [], alarms: [], skipped };

    for (const leaf of leaves) {
      this.scanVms(leaf, sink);
      this.scanAlarms(leaf, sink, parsedAt);
    }

    return {
      vms: sink.vms,
      alarms: sink.alarms,
      metadata: {
        shape,
        parsed_at: parsedAt.toISOString(),
        total_vms: sink.vms.length,
        total_alarms: sink.alarms.length,
        skipped_entries: sink.skipped
      }
    };
  }

  /**
   * Named container first, then the leaf itself when it looks like a VM.
   * A VM present both ways is emitted twice.
   */
  private scanVms(leaf: JsonRecord, sink: ScanSink): void {
    const key = firstPresentKey(leaf, VM_CONTAINER_KEYS);

    if (key !== undefined) {
      const container = leaf[key];

      if (Array.isArray(container)) {
        for (const entry of container) {
          if (isRecord(entry)) {
            sink.vms.push(normalizeVm(entry));
          } else {
            sink.skipped++;
          }
        }
      } else if (isRecord(container)) {
        for (const [vmKey, entry] of Object.entries(container)) {
          if (isRecord(entry)) {
            sink.vms.push(normalizeVm(withDefaultName(entry, vmKey)));
          } else {
            sink.skipped++;
          }
        }
      } else if (container !== null && container !== undefined) {
        sink.skipped++;
      }
    }

    if (VM_INDICATOR_KEYS.some((indicator) => indicator in leaf)) {
      sink.vms.push(normalizeVm(leaf));
    }
  }

  private scanAlarms(leaf: JsonRecord, sink: ScanSink, reference: Date): void {
    const key = firstPresentKey(leaf, ALARM_CONTAINER_KEYS);
    if (key === undefined) return;

    const container = leaf[key];

    if (Array.isArray(container)) {
      this.pushAlarms(container, sink, reference);
    } else if (isRecord(container)) {
      for (const [alarmKey, entry] of Object.entries(container)) {
        if (isRecord(entry)) {
          sink.alarms.push(normalizeAlarm(withDefaultName(entry, alarmKey), reference));
        } else if (Array.isArray(entry)) {
          this.pushAlarms(entry, sink, reference);
        } else {
          sink.skipped++;
        }
      }
    } else if (container !== null && container !== undefined) {
      sink.skipped++;
    }
  }

  private pushAlarms(entries: unknown[], sink: ScanSink, reference: Date): void {
    for (const entry of entries) {
      if (isRecord(entry)) {
        sink.alarms.push(normalizeAlarm(entry, reference));
      } else {
        sink.skipped++;
      }
    }
  }
}

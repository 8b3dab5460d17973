import type { TaggedAlarmRow, TaggedVmRow } from '@inventory/core';

/**
 * One artifact set: rows sharing an environment (or everything)
 */
export type ExportGroup = {
  environment: string | null;
  client: string | null;
  vms: TaggedVmRow[];
  alarms: TaggedAlarmRow[];
};

/**
 * Group rows by environment. Rows without an environment belong to no group.
 * Group order follows first appearance, VMs before alarms.
 */
export function partitionByEnvironment(
  vms: TaggedVmRow[],
  alarms: TaggedAlarmRow[]
): ExportGroup[] {
  const groups = new Map<string, ExportGroup>();

  const groupFor = (environment: string, client: string | null): ExportGroup => {
    let group = groups.get(environment);
    if (!group) {
      group = { environment, client: client ?? 'unknown', vms: [], alarms: [] };
      groups.set(environment, group);
    }
    return group;
  };

  for (const vm of vms) {
    if (vm.environment === null) continue;
    groupFor(vm.environment, vm.client).vms.push(vm);
  }
  for (const alarm of alarms) {
    if (alarm.environment === null) continue;
    groupFor(alarm.environment, alarm.client).alarms.push(alarm);
  }

  return [...groups.values()];
}

/**
 * A single group holding every row, labelled with the job's tags
 */
export function singleGroup(
  vms: TaggedVmRow[],
  alarms: TaggedAlarmRow[],
  environment: string | null,
  client: string | null
): ExportGroup[] {
  return [{ environment, client, vms, alarms }];
}

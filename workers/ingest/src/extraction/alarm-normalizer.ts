import { parseFlexibleTimestamp, type ExtractedAlarm } from '@inventory/core';
import { pickRaw, pickString, type JsonRecord } from './field-resolver';

export const ALARM_ALIASES = {
  name: ['name', 'alarm_name'],
  description: ['description', 'alarm_description'],
  severity: ['severity', 'alarm_severity'],
  status: ['status', 'alarm_status'],
  vmName: ['vm_name', 'entity_name', 'object_name'],
  triggeredTime: ['triggered_time', 'time', 'created_time']
} as const;

function readAcknowledged(source: JsonRecord): ExtractedAlarm['acknowledged'] {
  const value = source.acknowledged;
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return false;
}

/**
 * Normalize one alarm object into the canonical extracted shape
 */
export function normalizeAlarm(source: JsonRecord, reference: Date = new Date()): ExtractedAlarm {
  return {
    name: pickString(source, ALARM_ALIASES.name) ?? 'Unknown Alarm',
    description: pickString(source, ALARM_ALIASES.description) ?? '',
    severity: (pickString(source, ALARM_ALIASES.severity) ?? 'unknown').toLowerCase(),
    status: (pickString(source, ALARM_ALIASES.status) ?? 'unknown').toLowerCase(),
    vm_name: pickString(source, ALARM_ALIASES.vmName) ?? 'Unknown VM',
    triggered_time: parseFlexibleTimestamp(pickRaw(source, ALARM_ALIASES.triggeredTime), reference),
    acknowledged: readAcknowledged(source)
  };
}

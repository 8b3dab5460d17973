import { daysSince, type AlarmRow, type ExtractedAlarm, type SeverityLevel } from '@inventory/core';
import { coerceBoolean, coerceText } from './coerce';

const SEVERITY_LEVELS = new Map<string, SeverityLevel>([
  ['critical', 'Critical'],
  ['error', 'Critical'],
  ['warning', 'Warning'],
  ['info', 'Information'],
  ['information', 'Information'],
  ['normal', 'Normal']
]);

export const PRIORITY_SCORES: Record<SeverityLevel, number> = {
  Critical: 5,
  Warning: 3,
  Unknown: 2,
  Information: 1,
  Normal: 0
};

/**
 * Total: anything unrecognised is Unknown
 */
export function normalizeSeverity(raw: string): SeverityLevel {
  return SEVERITY_LEVELS.get(raw.trim().toLowerCase()) ?? 'Unknown';
}

export function cleanAlarm(alarm: ExtractedAlarm, now: Date = new Date()): AlarmRow {
  const severity = coerceText(alarm.severity, 'unknown');
  const severityNormalized = normalizeSeverity(severity);

  return {
    name: coerceText(alarm.name, 'Unknown Alarm'),
    description: alarm.description,
    severity,
    status: coerceText(alarm.status, 'unknown'),
    vm_name: coerceText(alarm.vm_name, 'Unknown VM'),
    triggered_time: alarm.triggered_time,
    acknowledged: coerceBoolean(alarm.acknowledged),
    severity_normalized: severityNormalized,
    priority_score: PRIORITY_SCORES[severityNormalized],
    days_since_triggered: alarm.triggered_time ? daysSince(alarm.triggered_time, now) : null
  };
}

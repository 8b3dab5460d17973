import { formatFileTimestamp } from '@inventory/core';

export type CollectionKind = 'vms' | 'alarms';

const JOB_REF_LENGTH = 8;

/**
 * Keep names portable across filesystems
 */
export function sanitizeNameComponent(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9.-]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned.length > 0 ? cleaned : 'unknown';
}

export function jobRef(jobId: string): string {
  return sanitizeNameComponent(jobId.slice(0, JOB_REF_LENGTH));
}

/**
 * inventory_{kind}[_{client}_{environment}]_{timestamp}_{jobRef}
 * The tag pair is included only when both are known.
 */
export function buildBaseName(input: {
  kind: CollectionKind;
  client: string | null;
  environment: string | null;
  timestamp: Date;
  jobId: string;
}): string {
  const parts = ['inventory', input.kind];
  if (input.client !== null && input.environment !== null) {
    parts.push(sanitizeNameComponent(input.client), sanitizeNameComponent(input.environment));
  }
  parts.push(formatFileTimestamp(input.timestamp), jobRef(input.jobId));
  return parts.join('_');
}

export function buildSummaryName(timestamp: Date, jobId: string): string {
  return `processing_summary_${formatFileTimestamp(timestamp)}_${jobRef(jobId)}.json`;
}

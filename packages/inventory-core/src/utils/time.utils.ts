import { differenceInDays, format, isValid, parse, parseISO, subDays } from 'date-fns';

/**
 * Layouts tried, in order, when a timestamp is not ISO-8601
 */
const FALLBACK_LAYOUTS = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'yyyy/MM/dd HH:mm:ss',
  'yyyy/MM/dd',
  'MM/dd/yyyy HH:mm:ss',
  'MM/dd/yyyy h:mm:ss a',
  'MM/dd/yyyy',
  'dd.MM.yyyy HH:mm:ss',
  'dd.MM.yyyy',
  'MMM d, yyyy h:mm:ss a',
  'MMM d, yyyy HH:mm:ss',
  'MMM d, yyyy',
  'd MMM yyyy HH:mm:ss',
  'EEE MMM d HH:mm:ss yyyy'
];

// Epoch values below this are seconds, above it milliseconds
const EPOCH_MILLIS_THRESHOLD = 1e11;

/**
 * Format a date as a file-name-safe timestamp (yyyyMMdd_HHmmss)
 */
export function formatFileTimestamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

/**
 * Parse a timestamp written in any of the common layouts.
 * Returns null instead of throwing when nothing fits.
 */
export function parseFlexibleTimestamp(value: unknown, reference: Date = new Date()): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const millis = Math.abs(value) < EPOCH_MILLIS_THRESHOLD ? value * 1000 : value;
    const date = new Date(millis);
    return isValid(date) ? date : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text.length === 0) return null;

  // Nine or more bare digits is an epoch; shorter runs are years or compact dates
  if (/^\d{9,}(\.\d+)?$/.test(text)) {
    return parseFlexibleTimestamp(Number(text), reference);
  }

  const iso = parseISO(text);
  if (isValid(iso)) return iso;

  for (const layout of FALLBACK_LAYOUTS) {
    const parsed = parse(text, layout, reference);
    if (isValid(parsed)) return parsed;
  }

  return null;
}

/**
 * Whole days elapsed between `from` and `now`
 */
export function daysSince(from: Date, now: Date = new Date()): number {
  return differenceInDays(now, from);
}

/**
 * Cutoff date for a retention window
 */
export function retentionCutoff(retentionDays: number, now: Date = new Date()): Date {
  return subDays(now, retentionDays);
}

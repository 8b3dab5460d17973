/**
 * Coerce-or-default helpers. Cleaning is the only stage that defaults values;
 * extraction leaves unresolved numerics as null.
 */

const TRUTHY_STRINGS = new Set(['true', 'yes', 'y', '1', 'acknowledged']);

/**
 * Finite number from a raw value, or `fallback`
 */
export function coerceFloat(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (text.length === 0) return fallback;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/**
 * Integer (truncated toward zero) from a raw value, or `fallback`
 */
export function coerceInteger(value: unknown, fallback = 0): number {
  return Math.trunc(coerceFloat(value, fallback));
}

export function coerceBoolean(value: unknown, fallback = false): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value !== 0 : fallback;
  if (typeof value === 'string') return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  return fallback;
}

export function coerceText(value: string | null | undefined, fallback: string): string {
  return value === null || value === undefined || value.trim() === '' ? fallback : value;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

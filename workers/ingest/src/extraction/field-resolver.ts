import type { RawNumeric } from '@inventory/core';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a key, falling back to a dotted path walk (`runtime.powerState`)
 * when the literal key is absent.
 */
export function readField(source: JsonRecord, key: string): unknown {
  if (key in source) {
    return source[key];
  }
  if (!key.includes('.')) {
    return undefined;
  }

  let current: unknown = source;
  for (const segment of key.split('.')) {
    if (!isRecord(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * First present scalar among the aliases, as a string
 */
export function pickString(source: JsonRecord, aliases: readonly string[]): string | null {
  for (const alias of aliases) {
    const value = readField(source, alias);
    if (!isPresent(value)) continue;

    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  }
  return null;
}

/**
 * First present number or numeric-looking string among the aliases.
 * Left raw: coercion happens during cleaning.
 */
export function pickNumeric(source: JsonRecord, aliases: readonly string[]): RawNumeric {
  for (const alias of aliases) {
    const value = readField(source, alias);
    if (!isPresent(value)) continue;

    if (typeof value === 'number' || typeof value === 'string') return value;
  }
  return null;
}

/**
 * First present value among the aliases, untouched
 */
export function pickRaw(source: JsonRecord, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    const value = readField(source, alias);
    if (isPresent(value)) return value;
  }
  return undefined;
}

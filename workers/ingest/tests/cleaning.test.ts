import { describe, it, expect } from 'vitest';
import type { ExtractedAlarm, ExtractedVm } from '@inventory/core';
import { normalizeVm } from '../src/extraction/vm-normalizer';
import { cleanAlarm, normalizeSeverity } from '../src/transform/alarm-cleaner';
import { coerceBoolean, coerceFloat, coerceInteger, round2 } from '../src/transform/coerce';
import { categorizeResourceScore, cleanVm } from '../src/transform/vm-cleaner';

function extractedVm(overrides: Partial<ExtractedVm> = {}): ExtractedVm {
  return {
    name: 'vm',
    uuid: null,
    power_state: 'unknown',
    cpu_count: null,
    memory_mb: null,
    disk_gb: null,
    network_count: null,
    guest_os: null,
    host_name: null,
    cluster_name: null,
    datacenter_name: null,
    ...overrides
  };
}

function extractedAlarm(overrides: Partial<ExtractedAlarm> = {}): ExtractedAlarm {
  return {
    name: 'alarm',
    description: '',
    severity: 'unknown',
    status: 'unknown',
    vm_name: 'vm',
    triggered_time: null,
    acknowledged: false,
    ...overrides
  };
}

describe('coerce helpers', () => {
  it('should parse numeric strings and default the rest', () => {
    expect(coerceFloat(' 12.5 ')).toBe(12.5);
    expect(coerceFloat('abc')).toBe(0);
    expect(coerceFloat(null)).toBe(0);
    expect(coerceFloat(Number.POSITIVE_INFINITY)).toBe(0);
  });

  it('should truncate integers toward zero', () => {
    expect(coerceInteger('8.7')).toBe(8);
    expect(coerceInteger(-3.9)).toBe(-3);
  });

  it('should read booleans from common spellings', () => {
    expect(coerceBoolean('yes')).toBe(true);
    expect(coerceBoolean('FALSE')).toBe(false);
    expect(coerceBoolean(1)).toBe(true);
    expect(coerceBoolean(0)).toBe(false);
    expect(coerceBoolean(undefined)).toBe(false);
  });

  it('should round to two places', () => {
    expect(round2(0.375)).toBe(0.38);
    expect(round2(1 / 3)).toBe(0.33);
  });
});

describe('categorizeResourceScore', () => {
  it('should place boundaries in the upper band', () => {
    expect(categorizeResourceScore(9.99)).toBe('Low');
    expect(categorizeResourceScore(10)).toBe('Medium');
    expect(categorizeResourceScore(49.99)).toBe('Medium');
    expect(categorizeResourceScore(50)).toBe('High');
    expect(categorizeResourceScore(99.99)).toBe('High');
    expect(categorizeResourceScore(100)).toBe('Critical');
    expect(categorizeResourceScore(1000)).toBe('Critical');
  });

  it('should treat negative scores as Low', () => {
    expect(categorizeResourceScore(-5)).toBe('Low');
  });
});

describe('cleanVm', () => {
  it('should score the web-01 VM as Medium', () => {
    const row = cleanVm(normalizeVm({
      name: 'web-01',
      power_state: 'poweredOn',
      num_cpu: 4,
      memory_mb: 8192,
      disk_gb: 100.5
    }));

    expect(row.name).toBe('web-01');
    expect(row.power_state).toBe('poweredon');
    expect(row.cpu_count).toBe(4);
    expect(row.memory_gb).toBe(8);
    expect(row.cpu_memory_ratio).toBe(2);
    expect(row.resource_score).toBeCloseTo(34.55, 2);
    expect(row.is_powered_on).toBe(true);
    expect(row.resource_category).toBe('Medium');
  });

  it('should never produce null or NaN numerics', () => {
    const row = cleanVm(extractedVm({ memory_mb: 'lots', disk_gb: '', network_count: null }));

    for (const value of [row.cpu_count, row.memory_mb, row.disk_gb, row.network_count, row.memory_gb, row.cpu_memory_ratio, row.resource_score]) {
      expect(value).toBe(0);
    }
    expect(row.resource_category).toBe('Low');
    expect(row.is_powered_on).toBe(false);
  });

  it('should coerce numeric strings', () => {
    const row = cleanVm(extractedVm({ cpu_count: '8.7', memory_mb: '3072', disk_gb: '20.25', network_count: '2' }));

    expect(row.cpu_count).toBe(8);
    expect(row.memory_mb).toBe(3072);
    expect(row.memory_gb).toBe(3);
    expect(row.cpu_memory_ratio).toBe(0.38);
    expect(row.disk_gb).toBe(20.25);
    expect(row.network_count).toBe(2);
  });

  it('should divide by one cpu when none are reported', () => {
    expect(cleanVm(extractedVm({ memory_mb: 4096 })).cpu_memory_ratio).toBe(4);
  });

  it('should default a blank name', () => {
    expect(cleanVm(extractedVm({ name: '  ' })).name).toBe('Unknown VM');
  });
});

describe('normalizeSeverity', () => {
  it('should map every input to one level', () => {
    expect(normalizeSeverity('critical')).toBe('Critical');
    expect(normalizeSeverity('ERROR')).toBe('Critical');
    expect(normalizeSeverity(' Warning ')).toBe('Warning');
    expect(normalizeSeverity('info')).toBe('Information');
    expect(normalizeSeverity('information')).toBe('Information');
    expect(normalizeSeverity('normal')).toBe('Normal');
    expect(normalizeSeverity('red')).toBe('Unknown');
    expect(normalizeSeverity('')).toBe('Unknown');
  });
});

describe('cleanAlarm', () => {
  const now = new Date(2024, 0, 11, 12, 0, 0);

  it('should rank ERROR as Critical with priority 5', () => {
    const row = cleanAlarm(extractedAlarm({ severity: 'ERROR' }), now);

    expect(row.severity).toBe('ERROR');
    expect(row.severity_normalized).toBe('Critical');
    expect(row.priority_score).toBe(5);
  });

  it('should assign priorities by level', () => {
    const priorities = ['warning', 'unknown', 'info', 'normal'].map(
      (severity) => cleanAlarm(extractedAlarm({ severity }), now).priority_score
    );
    expect(priorities).toEqual([3, 2, 1, 0]);
  });

  it('should count whole days since triggering', () => {
    const row = cleanAlarm(extractedAlarm({ triggered_time: new Date(2024, 0, 1, 9, 0, 0) }), now);
    expect(row.days_since_triggered).toBe(10);
  });

  it('should leave the age null without a trigger time', () => {
    expect(cleanAlarm(extractedAlarm(), now).days_since_triggered).toBeNull();
  });

  it('should coerce acknowledged', () => {
    expect(cleanAlarm(extractedAlarm({ acknowledged: 'true' }), now).acknowledged).toBe(true);
    expect(cleanAlarm(extractedAlarm({ acknowledged: 0 }), now).acknowledged).toBe(false);
  });
});

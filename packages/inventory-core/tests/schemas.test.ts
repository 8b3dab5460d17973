import { describe, it, expect } from 'vitest';
import {
  environmentPatternTableSchema,
  ingestJobSchema,
  jobFilterSchema,
  newJobSchema
} from '../src/schemas';

const validJob = {
  id: '123e4567-e89b-12d3-a456-426614174000',
  file_name: 'inventory.json',
  source_path: '/data/inbox/prod-vcenter1/inventory.json',
  status: 'pending',
  environment: 'production-vc1',
  client: 'client-a',
  datacenter: null,
  vm_count: 0,
  alarm_count: 0,
  artifacts: [],
  error: null,
  created_at: '2024-01-15T10:00:00.000Z',
  started_at: null,
  completed_at: null
};

describe('Ingest Job Schema', () => {
  it('should validate correct job data', () => {
    expect(() => ingestJobSchema.parse(validJob)).not.toThrow();
  });

  it('should accept timestamps with an offset', () => {
    const job = ingestJobSchema.parse({ ...validJob, created_at: '2024-01-15T10:00:00+00:00' });
    expect(job.created_at).toBe('2024-01-15T10:00:00+00:00');
  });

  it('should reject invalid UUID', () => {
    expect(() => ingestJobSchema.parse({ ...validJob, id: 'not-a-uuid' })).toThrow();
  });

  it('should reject invalid status', () => {
    expect(() => ingestJobSchema.parse({ ...validJob, status: 'queued' })).toThrow();
  });

  it('should reject negative counts', () => {
    expect(() => ingestJobSchema.parse({ ...validJob, vm_count: -1 })).toThrow();
  });
});

describe('New Job Schema', () => {
  it('should default missing tags to null', () => {
    const job = newJobSchema.parse({ source_path: '/data/inbox/a.json', file_name: 'a.json' });

    expect(job.environment).toBeNull();
    expect(job.client).toBeNull();
    expect(job.datacenter).toBeNull();
  });

  it('should reject an empty path', () => {
    expect(() => newJobSchema.parse({ source_path: '', file_name: 'a.json' })).toThrow();
  });
});

describe('Job Filter Schema', () => {
  it('should coerce query-string numbers', () => {
    const filter = jobFilterSchema.parse({ status: 'failed', limit: '20', offset: '40' });

    expect(filter).toEqual({ status: 'failed', limit: 20, offset: 40 });
  });

  it('should apply default paging', () => {
    expect(jobFilterSchema.parse({})).toEqual({ limit: 50, offset: 0 });
  });

  it('should reject a limit above 500', () => {
    expect(() => jobFilterSchema.parse({ limit: 501 })).toThrow();
  });
});

describe('Environment Pattern Table Schema', () => {
  it('should accept partial entries', () => {
    const table = environmentPatternTableSchema.parse([
      { pattern: 'prod-vcenter1', environment: 'production-vc1' },
      { pattern: 'dc-east', datacenter: 'east' }
    ]);

    expect(table[1]).toEqual({ pattern: 'dc-east', datacenter: 'east' });
  });

  it('should reject an empty pattern', () => {
    expect(() => environmentPatternTableSchema.parse([{ pattern: '' }])).toThrow();
  });
});

import { subDays, subHours } from 'date-fns';
import { beforeEach, describe, it, expect } from 'vitest';
import { createJobInState, createJobs, MemoryJobStore } from '@inventory/test-utils';
import { getJobStatistics } from '../src/jobs/job-statistics';

const now = new Date('2024-06-01T12:00:00.000Z');
const jobId = '123e4567-e89b-12d3-a456-426614174000';

describe('getJobStatistics', () => {
  let store: MemoryJobStore;

  beforeEach(() => {
    store = new MemoryJobStore();
  });

  it('should report zeros for an empty store', async () => {
    const stats = await getJobStatistics(store, now);

    expect(stats.job_statistics).toEqual({
      total: 0,
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      success_rate: 0
    });
    expect(stats.environment_statistics).toEqual([]);
    expect(stats.client_statistics).toEqual([]);
    expect(stats.system_health).toEqual({ recent_errors: 0, status: 'healthy' });
  });

  it('should aggregate counts, totals and groups', async () => {
    for (const job of createJobs(3, {
      status: 'completed',
      environment: 'prod',
      client: 'client-a',
      vm_count: 2,
      alarm_count: 1,
      created_at: subHours(now, 2).toISOString()
    })) {
      store.seed(job);
    }
    store.seed(createJobInState('failed', {
      environment: 'dev',
      client: 'client-b',
      created_at: subDays(now, 3).toISOString()
    }));
    store.seed(createJobInState('pending', {
      environment: null,
      client: null,
      created_at: subHours(now, 1).toISOString()
    }));

    const stats = await getJobStatistics(store, now);

    expect(stats.job_statistics).toEqual({
      total: 5,
      pending: 1,
      processing: 0,
      completed: 3,
      failed: 1,
      success_rate: 60
    });
    expect(stats.data_statistics).toEqual({ total_vms: 6, total_alarms: 3, recent_jobs_24h: 4 });
    expect(stats.environment_statistics).toEqual([
      { environment: 'dev', job_count: 1, vm_count: 0, alarm_count: 0 },
      { environment: 'prod', job_count: 3, vm_count: 6, alarm_count: 3 }
    ]);
    expect(stats.client_statistics).toEqual([
      { client: 'client-a', job_count: 3, vm_count: 6, alarm_count: 3 },
      { client: 'client-b', job_count: 1, vm_count: 0, alarm_count: 0 }
    ]);
  });

  it('should round the success rate to two decimals', async () => {
    store.seed(createJobInState('completed'));
    store.seed(createJobInState('failed'));
    store.seed(createJobInState('failed'));

    expect((await getJobStatistics(store, now)).job_statistics.success_rate).toBe(33.33);
  });

  it('should warn once five errors were logged in the last day', async () => {
    for (let i = 0; i < 5; i++) {
      await store.appendLog({
        job_id: jobId,
        level: 'error',
        message: 'Job failed',
        created_at: subHours(now, i + 1).toISOString()
      });
    }
    await store.appendLog({ job_id: jobId, level: 'error', message: 'Job failed', created_at: subDays(now, 2).toISOString() });
    await store.appendLog({ job_id: jobId, level: 'warn', message: 'Slow export', created_at: subHours(now, 1).toISOString() });

    expect((await getJobStatistics(store, now)).system_health).toEqual({ recent_errors: 5, status: 'warning' });
  });
});

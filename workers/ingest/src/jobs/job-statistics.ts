import { subHours } from 'date-fns';
import type { GroupAggregate, JobStore } from '@inventory/core';

const RECENT_WINDOW_HOURS = 24;
const RECENT_ERROR_WARNING_THRESHOLD = 5;

type GroupStatistics = {
  job_count: number;
  vm_count: number;
  alarm_count: number;
};

export type JobStatistics = {
  job_statistics: {
    total: number;
    pending: number;
    processing: number;
    completed: number;
    failed: number;
    /** Completed share of all jobs, in percent */
    success_rate: number;
  };
  data_statistics: {
    total_vms: number;
    total_alarms: number;
    recent_jobs_24h: number;
  };
  environment_statistics: Array<{ environment: string } & GroupStatistics>;
  client_statistics: Array<{ client: string } & GroupStatistics>;
  system_health: {
    recent_errors: number;
    status: 'healthy' | 'warning';
  };
};

function groupStatistics(group: GroupAggregate): GroupStatistics {
  return { job_count: group.job_count, vm_count: group.vm_count, alarm_count: group.alarm_count };
}

/**
 * Dashboard statistics over every job; recent figures cover the last 24 hours
 */
export async function getJobStatistics(store: JobStore, now: Date = new Date()): Promise<JobStatistics> {
  const aggregates = await store.aggregate(subHours(now, RECENT_WINDOW_HOURS));
  const { counts } = aggregates;

  const total = counts.pending + counts.processing + counts.completed + counts.failed;
  const successRate = total > 0 ? Math.round((counts.completed / total) * 10_000) / 100 : 0;

  return {
    job_statistics: { total, ...counts, success_rate: successRate },
    data_statistics: {
      total_vms: aggregates.total_vms,
      total_alarms: aggregates.total_alarms,
      recent_jobs_24h: aggregates.recent_jobs
    },
    environment_statistics: aggregates.by_environment.map((group) => ({
      environment: group.key,
      ...groupStatistics(group)
    })),
    client_statistics: aggregates.by_client.map((group) => ({
      client: group.key,
      ...groupStatistics(group)
    })),
    system_health: {
      recent_errors: aggregates.recent_errors,
      status: aggregates.recent_errors < RECENT_ERROR_WARNING_THRESHOLD ? 'healthy' : 'warning'
    }
  };
}

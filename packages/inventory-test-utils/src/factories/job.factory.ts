import { faker } from '@faker-js/faker';
import type { IngestJob, JobStatus } from '@inventory/core';

export interface JobFactoryOptions {
  id?: string;
  file_name?: string;
  source_path?: string;
  status?: JobStatus;
  environment?: string | null;
  client?: string | null;
  datacenter?: string | null;
  vm_count?: number;
  alarm_count?: number;
  artifacts?: string[];
  error?: string | null;
  created_at?: string;
  started_at?: string | null;
  completed_at?: string | null;
}

export function createJob(options: JobFactoryOptions = {}): IngestJob {
  const fileName = options.file_name ?? `${faker.system.fileName({ extensionCount: 0 })}.json`;

  return {
    id: options.id ?? faker.string.uuid(),
    file_name: fileName,
    source_path: options.source_path ?? `/data/inbox/${fileName}`,
    status: options.status ?? 'pending',
    environment: options.environment === undefined
      ? faker.helpers.arrayElement(['production', 'development', 'staging'])
      : options.environment,
    client: options.client === undefined ? `client-${faker.word.noun()}` : options.client,
    datacenter: options.datacenter === undefined ? 'unknown' : options.datacenter,
    vm_count: options.vm_count ?? 0,
    alarm_count: options.alarm_count ?? 0,
    artifacts: options.artifacts ?? [],
    error: options.error ?? null,
    created_at: options.created_at ?? faker.date.past().toISOString(),
    started_at: options.started_at ?? null,
    completed_at: options.completed_at ?? null
  };
}

export function createJobInState(status: JobStatus, options: JobFactoryOptions = {}): IngestJob {
  return createJob({ ...options, status });
}

export function createJobs(count: number, options: JobFactoryOptions = {}): IngestJob[] {
  return Array.from({ length: count }, () => createJob(options));
}

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import request from 'supertest';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { Express } from 'express';
import type { IngestConfig } from '@inventory/core';
import { createIngestRuntime } from '@inventory/ingest';
import { createJobInState, createJobs, createTempDir, MemoryJobStore, removeDir, writeFixture } from '@inventory/test-utils';
import { createApp } from '../src/app';

const WEB_01 = JSON.stringify({
  vms: [{ name: 'web-01', power_state: 'poweredOn', num_cpu: 4, memory_mb: 8192, disk_gb: 100.5 }]
});

describe('API', () => {
  let root: string;
  let config: IngestConfig;
  let store: MemoryJobStore;
  let app: Express;

  beforeEach(async () => {
    root = await createTempDir('inventory-api-');
    config = {
      watchDirectory: path.join(root, 'inbox'),
      processedDirectory: path.join(root, 'processed'),
      outputDirectory: path.join(root, 'outputs'),
      environmentPatterns: [{ pattern: 'prod-vcenter1', environment: 'production-vc1', client: 'client-a' }],
      maxFileSizeMb: 50,
      settleDelayMs: 10,
      batchSize: 10,
      processingIntervalMinutes: 60,
      cleanupIntervalHours: 24,
      retentionDays: 30,
      exportFormats: ['json'],
      separateByEnvironment: true,
      startupScanDelayMs: 0
    };
    await fs.mkdir(config.watchDirectory, { recursive: true });
    await fs.mkdir(config.outputDirectory, { recursive: true });
    store = new MemoryJobStore();
    app = createApp(createIngestRuntime(config, store));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('POST /jobs', () => {
    it('should reject a body without a path', async () => {
      const res = await request(app).post('/jobs').send({});

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('should return 404 for a missing file', async () => {
      const missing = path.join(config.watchDirectory, 'missing.json');
      const res = await request(app).post('/jobs').send({ path: missing });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: `File not found: ${missing}`, code: 'SOURCE_MISSING' });
    });

    it('should reject unsupported formats', async () => {
      const filePath = await writeFixture(config.watchDirectory, 'notes.txt', 'hello');
      const res = await request(app).post('/jobs').send({ path: filePath });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Unsupported file format: .txt');
    });

    it('should create a classified job, then return it while active', async () => {
      const filePath = await writeFixture(config.watchDirectory, 'prod-vcenter1/inventory.json', WEB_01);

      const first = await request(app).post('/jobs').send({ path: filePath });
      expect(first.status).toBe(201);
      expect(first.body.created).toBe(true);
      expect(first.body.job).toMatchObject({
        source_path: filePath,
        status: 'pending',
        environment: 'production-vc1',
        client: 'client-a'
      });

      const second = await request(app).post('/jobs').send({ path: filePath });
      expect(second.status).toBe(200);
      expect(second.body.created).toBe(false);
      expect(second.body.job.id).toBe(first.body.job.id);
    });
  });

  describe('POST /jobs/process', () => {
    it('should run a pass and report counts', async () => {
      const filePath = await writeFixture(config.watchDirectory, 'inventory.json', WEB_01);
      await request(app).post('/jobs').send({ path: filePath });

      const res = await request(app).post('/jobs/process');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        processed: 1,
        completed: 1,
        failed: 0,
        counts: { pending: 0, processing: 0, completed: 1, failed: 0 }
      });
    });
  });

  describe('GET /jobs', () => {
    it('should fetch one job', async () => {
      const job = store.seed(createJobInState('failed'));

      const res = await request(app).get(`/jobs/${job.id}`);

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(job.id);
    });

    it('should return 404 for an unknown job', async () => {
      const res = await request(app).get('/jobs/123e4567-e89b-12d3-a456-426614174999');

      expect(res.status).toBe(404);
    });

    it('should return 404 for an id that is not a uuid', async () => {
      const res = await request(app).get('/jobs/abc');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Job not found: abc', code: 'JOB_NOT_FOUND' });
    });

    it('should filter by status', async () => {
      store.seed(createJobInState('failed'));
      store.seed(createJobInState('completed'));
      store.seed(createJobInState('completed'));

      const res = await request(app).get('/jobs').query({ status: 'completed', limit: '1' });

      expect(res.status).toBe(200);
      expect(res.body.jobs).toHaveLength(1);
      expect(res.body.jobs[0].status).toBe('completed');
      expect(res.body.limit).toBe(1);
    });

    it('should reject an invalid filter', async () => {
      const res = await request(app).get('/jobs').query({ status: 'stuck' });

      expect(res.status).toBe(400);
    });
  });

  describe('POST /jobs/:id/retry', () => {
    it('should reset a failed job', async () => {
      const job = store.seed(createJobInState('failed', { error: 'boom' }));

      const res = await request(app).post(`/jobs/${job.id}/retry`);

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('pending');
      expect(res.body.error).toBeNull();
    });

    it('should conflict for jobs that are not failed', async () => {
      const job = store.seed(createJobInState('completed'));

      const res = await request(app).post(`/jobs/${job.id}/retry`);

      expect(res.status).toBe(409);
      expect(res.body.code).toBe('JOB_TRANSITION_ERROR');
    });

    it('should return 404 for an unknown job', async () => {
      const res = await request(app).post('/jobs/123e4567-e89b-12d3-a456-426614174999/retry');

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('JOB_NOT_FOUND');
    });

    it('should return 404 for an id that is not a uuid', async () => {
      const res = await request(app).post('/jobs/abc/retry');

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('JOB_NOT_FOUND');
    });
  });

  describe('GET /jobs/:id/logs', () => {
    it('should return the log of a job, newest first', async () => {
      const job = store.seed(createJobInState('completed'));
      await store.appendLog({ job_id: job.id, level: 'info', message: 'Job started', created_at: '2024-01-15T10:30:45.000Z' });
      await store.appendLog({ job_id: job.id, level: 'info', message: 'Job completed', created_at: '2024-01-15T10:30:46.000Z' });

      const res = await request(app).get(`/jobs/${job.id}/logs`);

      expect(res.status).toBe(200);
      expect(res.body.job_id).toBe(job.id);
      expect(res.body.logs.map((log: { message: string }) => log.message)).toEqual(['Job completed', 'Job started']);
    });

    it('should return 404 for an unknown job', async () => {
      const res = await request(app).get('/jobs/123e4567-e89b-12d3-a456-426614174999/logs');

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('JOB_NOT_FOUND');
    });
  });

  describe('GET /jobs/:id/artifacts/:name', () => {
    it('should download a recorded artifact', async () => {
      const artifact = await writeFixture(config.outputDirectory, 'inventory_vms.csv', 'name\nweb-01\n');
      const job = store.seed(createJobInState('completed', { artifacts: [artifact] }));

      const res = await request(app).get(`/jobs/${job.id}/artifacts/inventory_vms.csv`);

      expect(res.status).toBe(200);
      expect(res.headers['content-disposition']).toBe('attachment; filename="inventory_vms.csv"');
      expect(res.text).toBe('name\nweb-01\n');
    });

    it('should not serve files the job did not record', async () => {
      const artifact = await writeFixture(config.outputDirectory, 'inventory_vms.csv', 'name\n');
      await writeFixture(config.outputDirectory, 'other_vms.csv', 'name\n');
      const job = store.seed(createJobInState('completed', { artifacts: [artifact] }));

      const res = await request(app).get(`/jobs/${job.id}/artifacts/other_vms.csv`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Artifact not found' });
    });

    it('should return 404 when a recorded artifact is gone', async () => {
      const job = store.seed(createJobInState('completed', {
        artifacts: [path.join(config.outputDirectory, 'inventory_vms.csv')]
      }));

      const res = await request(app).get(`/jobs/${job.id}/artifacts/inventory_vms.csv`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Artifact not found' });
    });
  });

  describe('GET /stats', () => {
    it('should summarize jobs and data volumes', async () => {
      for (const job of createJobs(2, {
        status: 'completed',
        environment: 'prod',
        client: 'client-a',
        vm_count: 3,
        alarm_count: 1,
        created_at: new Date().toISOString()
      })) {
        store.seed(job);
      }
      store.seed(createJobInState('failed', { environment: 'prod', client: 'client-a', created_at: new Date().toISOString() }));

      const res = await request(app).get('/stats');

      expect(res.status).toBe(200);
      expect(res.body.job_statistics).toEqual({
        total: 3,
        pending: 0,
        processing: 0,
        completed: 2,
        failed: 1,
        success_rate: 66.67
      });
      expect(res.body.data_statistics).toEqual({ total_vms: 6, total_alarms: 2, recent_jobs_24h: 3 });
      expect(res.body.environment_statistics).toEqual([
        { environment: 'prod', job_count: 3, vm_count: 6, alarm_count: 2 }
      ]);
      expect(res.body.system_health).toEqual({ recent_errors: 0, status: 'healthy' });
    });
  });

  describe('POST /files/validate', () => {
    it('should report the extraction without creating a job', async () => {
      const filePath = await writeFixture(config.watchDirectory, 'inventory.json', WEB_01);

      const res = await request(app).post('/files/validate').send({ path: filePath });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ valid: true, shape: 'direct', vmCount: 1, alarmCount: 0 });
      expect(store.all()).toHaveLength(0);
    });

    it('should return 404 for a missing file', async () => {
      const res = await request(app).post('/files/validate').send({ path: path.join(os.tmpdir(), 'no-such-inventory.json') });

      expect(res.status).toBe(404);
    });
  });

  describe('GET /health', () => {
    it('should report ok when store and directories are reachable', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(res.body.checks.store).toEqual({ ok: true });
    });

    it('should report degraded when the store is down', async () => {
      store.pingError = new Error('connection refused');

      const res = await request(app).get('/health');

      expect(res.status).toBe(503);
      expect(res.body.status).toBe('degraded');
      expect(res.body.checks.store).toEqual({ ok: false, error: 'connection refused' });
    });
  });
});

import { promises as fs } from 'fs';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { IngestConfig } from '@inventory/core';
import { createJobInState, MemoryJobStore, removeDir, waitForCondition, writeFixture } from '@inventory/test-utils';
import { EnvironmentClassifier } from '../src/classification/environment-classifier';
import { InventoryFileWatcher, type FileWatcherOptions } from '../src/watcher/file-watcher';
import { createTestConfig, tempRoot } from './helpers';

describe('InventoryFileWatcher', () => {
  let config: IngestConfig;
  let store: MemoryJobStore;
  let watcher: InventoryFileWatcher;

  const createWatcher = (overrides: Partial<FileWatcherOptions> = {}) => new InventoryFileWatcher({
    store,
    classifier: new EnvironmentClassifier({ patterns: config.environmentPatterns, root: config.watchDirectory }),
    watchDirectory: config.watchDirectory,
    maxFileSizeMb: config.maxFileSizeMb,
    settleDelayMs: config.settleDelayMs,
    ...overrides
  });

  beforeEach(async () => {
    config = await createTestConfig();
    await fs.mkdir(config.watchDirectory, { recursive: true });
    store = new MemoryJobStore();
    watcher = createWatcher();
  });

  afterEach(async () => {
    await watcher.stop();
    await removeDir(tempRoot(config));
  });

  it('should ignore unsupported extensions', async () => {
    const filePath = await writeFixture(config.watchDirectory, 'notes.txt', 'hello');

    expect(await watcher.handleFileEvent(filePath)).toBe(false);
    expect(watcher.pendingCount).toBe(0);
  });

  it('should ignore files over the size limit', async () => {
    watcher = createWatcher({ maxFileSizeMb: 0.000001 });
    const filePath = await writeFixture(config.watchDirectory, 'big.json', '{"vms": []}');

    expect(await watcher.handleFileEvent(filePath)).toBe(false);
  });

  it('should ignore files that no longer exist', async () => {
    expect(await watcher.handleFileEvent(`${config.watchDirectory}/missing.json`)).toBe(false);
  });

  it('should enqueue a classified job after the settle delay', async () => {
    const filePath = await writeFixture(config.watchDirectory, 'prod-vcenter1/inventory.JSON', '{}');

    expect(await watcher.handleFileEvent(filePath)).toBe(true);
    await waitForCondition(() => store.all().length === 1);

    expect(store.all()[0]).toMatchObject({
      source_path: filePath,
      file_name: 'inventory.JSON',
      status: 'pending',
      environment: 'production-vc1',
      client: 'client-a',
      datacenter: 'unknown'
    });
  });

  it('should restart the settle delay on repeated events', async () => {
    watcher = createWatcher({ settleDelayMs: 50 });
    const filePath = await writeFixture(config.watchDirectory, 'a.yaml', 'vms: []\n');

    await watcher.handleFileEvent(filePath);
    await watcher.handleFileEvent(filePath);
    expect(watcher.pendingCount).toBe(1);

    await waitForCondition(() => watcher.pendingCount === 0);
    expect(store.all()).toHaveLength(1);
  });

  it('should not duplicate an active job', async () => {
    const filePath = await writeFixture(config.watchDirectory, 'a.json', '{}');
    store.seed(createJobInState('pending', { source_path: filePath }));

    await watcher.handleFileEvent(filePath);
    await waitForCondition(() => watcher.pendingCount === 0);

    expect(store.all()).toHaveLength(1);
  });

  it('should cancel pending enqueues on stop', async () => {
    watcher = createWatcher({ settleDelayMs: 60_000 });
    const filePath = await writeFixture(config.watchDirectory, 'a.json', '{}');

    await watcher.handleFileEvent(filePath);
    await watcher.stop();

    expect(watcher.pendingCount).toBe(0);
    expect(store.all()).toHaveLength(0);
  });

  it('should enqueue existing files no job knows about', async () => {
    await writeFixture(config.watchDirectory, 'a.json', '{}');
    await writeFixture(config.watchDirectory, 'nested/deeper/b.yml', 'vms: []\n');
    await writeFixture(config.watchDirectory, 'c.txt', 'skip');
    const known = await writeFixture(config.watchDirectory, 'd.json', '{}');
    store.seed(createJobInState('completed', { source_path: known, file_name: 'd.json' }));

    expect(await watcher.scanExisting()).toBe(2);
    expect(store.all().map((job) => job.file_name).sort()).toEqual(['a.json', 'b.yml', 'd.json']);
  });

  it('should pick up files dropped after start', async () => {
    await watcher.start();

    const filePath = await writeFixture(config.watchDirectory, 'dropped.json', '{}');

    await waitForCondition(() => store.all().length === 1);
    expect(store.all()[0].source_path).toBe(filePath);
  });
});

import test from 'node:test';
import assert from 'node:assert/strict';
import type { AppConfig } from './config/index.ts';
import { closeAppContext, createAppContext, ensureCollectorStarted } from './context.ts';
import type { NodeMetricsProvider } from './kubernetes/provider.ts';

const config: AppConfig = {
  host: '127.0.0.1',
  port: 0,
  databasePath: ':memory:',
  collectIntervalMs: 60_000,
  collectorEnabled: true,
  kubeConfigMode: 'default',
};

test('ensureCollectorStarted: 首个周期写入后 closeAppContext 等待其完成', async () => {
  const provider: NodeMetricsProvider = {
    listNodeUsage: async () => [
      { node_name: 'node-a', cpu_used: 1000, memory_used: 2048 },
      { node_name: 'node-b', cpu_used: 3000, memory_used: 4096 },
    ],
    getNodeCapacity: async () => 4000,
  };
  const context = createAppContext(config, provider);

  const collector = ensureCollectorStarted(context);
  assert.equal(ensureCollectorStarted(context), collector);

  await collector.stop();
  const rows = context.store.queryAll();
  assert.equal(rows.length, 2);
  for (const row of rows) {
    assert.equal(row.cluster_total_cpu, 8000);
    assert.equal(row.cluster_cpu_usage, 50);
  }
  assert.deepEqual(
    rows.map((row) => [row.node_name, row.cpu_usage]).sort(),
    [['node-a', 25], ['node-b', 75]],
  );

  const status = collector.getStatus();
  assert.equal(status.cyclesRun, 1);
  assert.equal(status.rowsWritten, 2);

  await closeAppContext(context);
  assert.equal(context.database.sqlite.open, false);
});

test('reset 与进行中的采集周期交错：新周期只写入空表，不与旧数据并存', async () => {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const provider: NodeMetricsProvider = {
    listNodeUsage: async () => {
      await gate;
      return [{ node_name: 'node-fresh', cpu_used: 500, memory_used: 1024 }];
    },
    getNodeCapacity: async () => 1000,
  };
  const context = createAppContext(config, provider);
  context.store.append({
    timestamp: '2026-01-01T00:00:00.000Z',
    node_name: 'node-stale',
    cpu_usage: 10,
    memory_usage: 1024,
    is_benchmark: false,
    cluster_cpu_usage: 10,
    cluster_total_cpu: 1000,
  });

  const collector = ensureCollectorStarted(context);
  context.store.reset();
  release();
  await collector.stop();

  const rows = context.store.queryAll();
  assert.deepEqual(rows.map((row) => [row.id, row.node_name, row.cpu_usage]), [[1, 'node-fresh', 50]]);

  await closeAppContext(context);
});

import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import type { CycleReport } from '@nodepulse/shared';
import { applyCycleReport, createIdleCollectorStatus, startCollector } from './runner.ts';

function report(overrides: Partial<CycleReport> = {}): CycleReport {
  return {
    status: 'written',
    startedAt: '2026-01-01T00:00:00.000Z',
    nodesListed: 2,
    nodesResolved: 2,
    nodesSkipped: 0,
    rowsWritten: 2,
    writeFailures: 0,
    clusterCpuUsage: 40,
    clusterTotalCpu: 4000,
    errors: [],
    ...overrides,
  };
}

function deferred(): { promise: Promise<CycleReport>; resolve: (value: CycleReport) => void } {
  let resolve: (value: CycleReport) => void = () => {};
  const promise = new Promise<CycleReport>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

test('applyCycleReport: 累计周期统计并记录最后一个错误', () => {
  const status = createIdleCollectorStatus(1000);
  applyCycleReport(status, report());
  applyCycleReport(status, report({
    startedAt: '2026-01-01T00:00:01.000Z',
    nodesResolved: 1,
    nodesSkipped: 1,
    rowsWritten: 0,
    writeFailures: 1,
    errors: [
      { stage: 'capacity', message: 'timeout', nodeName: 'node-b' },
      { stage: 'write', message: 'disk full', nodeName: 'node-a' },
    ],
  }));
  applyCycleReport(status, report({
    status: 'skipped_fetch',
    startedAt: '2026-01-01T00:00:02.000Z',
    nodesListed: 0,
    nodesResolved: 0,
    rowsWritten: 0,
    errors: [{ stage: 'list', message: 'unavailable' }],
  }));

  assert.equal(status.cyclesRun, 3);
  assert.equal(status.cyclesSkipped, 1);
  assert.equal(status.rowsWritten, 2);
  assert.equal(status.nodesSkipped, 1);
  assert.equal(status.writeFailures, 1);
  assert.equal(status.lastCycleAt, '2026-01-01T00:00:02.000Z');
  assert.deepEqual(status.lastError, {
    stage: 'list',
    message: 'unavailable',
    at: '2026-01-01T00:00:02.000Z',
  });
});

test('applyCycleReport: 无错误的周期不覆盖上一次错误', () => {
  const status = createIdleCollectorStatus(1000);
  applyCycleReport(status, report({ errors: [{ stage: 'list', message: 'unavailable' }] }));
  applyCycleReport(status, report({ startedAt: '2026-01-01T00:00:05.000Z' }));
  assert.equal(status.lastError?.message, 'unavailable');
  assert.equal(status.lastCycleAt, '2026-01-01T00:00:05.000Z');
});

test('startCollector: 启动后立即执行一次并记录状态', async () => {
  let calls = 0;
  const collector = startCollector({
    intervalMs: 60_000,
    runCycle: async () => {
      calls += 1;
      return report();
    },
  });

  assert.equal(collector.getStatus().started, true);
  await collector.stop();

  const status = collector.getStatus();
  assert.equal(calls, 1);
  assert.equal(status.started, false);
  assert.equal(status.cyclesRun, 1);
  assert.equal(status.rowsWritten, 2);
  assert.equal(status.intervalMs, 60_000);
});

test('startCollector: getStatus() 返回副本，修改不影响内部状态', async () => {
  const collector = startCollector({
    intervalMs: 60_000,
    runCycle: async () => report({
      writeFailures: 1,
      errors: [{ stage: 'write', message: 'disk I/O error', nodeName: 'node-a' }],
    }),
  });
  await collector.stop();

  const snapshot = collector.getStatus();
  assert.ok(snapshot.lastReport);
  snapshot.lastReport.rowsWritten = 99;
  snapshot.lastReport.errors.length = 0;
  assert.ok(snapshot.lastError);
  snapshot.lastError.message = 'changed';

  const fresh = collector.getStatus();
  assert.equal(fresh.lastReport?.rowsWritten, 2);
  assert.deepEqual(fresh.lastReport?.errors, [{ stage: 'write', message: 'disk I/O error', nodeName: 'node-a' }]);
  assert.equal(fresh.lastError?.message, 'disk I/O error');
});

test('startCollector: stop() 等待正在执行的周期结束', async () => {
  const pending = deferred();
  const collector = startCollector({ intervalMs: 60_000, runCycle: () => pending.promise });

  let stopped = false;
  const stopping = collector.stop().then(() => {
    stopped = true;
  });

  await sleep(10);
  assert.equal(stopped, false);

  pending.resolve(report());
  await stopping;
  assert.equal(stopped, true);
  assert.equal(collector.getStatus().cyclesRun, 1);
});

test('startCollector: 上一周期未结束时跳过后续 tick', async () => {
  const pending = deferred();
  let calls = 0;
  const collector = startCollector({
    intervalMs: 5,
    runCycle: () => {
      calls += 1;
      return pending.promise;
    },
  });

  await sleep(40);
  assert.equal(calls, 1);

  pending.resolve(report());
  await collector.stop();
  assert.equal(calls, 1);
  assert.equal(collector.getStatus().cyclesRun, 1);
});

test('startCollector: 周期意外失败时记录 lastError 且循环继续', async () => {
  let calls = 0;
  const collector = startCollector({
    intervalMs: 5,
    runCycle: async () => {
      calls += 1;
      if (calls === 1) throw new Error('unexpected');
      return report();
    },
  });

  await sleep(40);
  await collector.stop();

  const status = collector.getStatus();
  assert.ok(calls >= 2);
  assert.equal(status.cyclesRun, calls - 1);
  assert.equal(status.lastError?.stage, 'cycle');
  assert.equal(status.lastError?.message, 'unexpected');
});

test('startCollector: 重复 stop() 是幂等的', async () => {
  const collector = startCollector({ intervalMs: 60_000, runCycle: async () => report() });
  await collector.stop();
  await collector.stop();
  assert.equal(collector.getStatus().started, false);
});

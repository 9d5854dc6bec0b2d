// ============================================================
// 采集循环
// 启动后立即执行一次，之后按固定间隔执行；周期之间不重叠
// stop() 会等待正在执行的周期结束
// ============================================================

import type { CollectorStatus, CycleReport } from '@nodepulse/shared';
import { getErrorMessage } from '@/lib/errors';

export type CollectorOptions = {
  intervalMs: number;
  runCycle: () => Promise<CycleReport>;
};

export type CollectorHandle = {
  stop: () => Promise<void>;
  getStatus: () => CollectorStatus;
};

export function createIdleCollectorStatus(intervalMs: number): CollectorStatus {
  return {
    started: false,
    startedAt: null,
    intervalMs,
    cyclesRun: 0,
    cyclesSkipped: 0,
    rowsWritten: 0,
    nodesSkipped: 0,
    writeFailures: 0,
    lastCycleAt: null,
    lastError: null,
    lastReport: null,
  };
}

export function applyCycleReport(status: CollectorStatus, report: CycleReport): void {
  status.cyclesRun += 1;
  if (report.status !== 'written') {
    status.cyclesSkipped += 1;
  }
  status.rowsWritten += report.rowsWritten;
  status.nodesSkipped += report.nodesSkipped;
  status.writeFailures += report.writeFailures;
  status.lastCycleAt = report.startedAt;
  status.lastReport = report;

  const lastError = report.errors[report.errors.length - 1];
  if (lastError) {
    status.lastError = { ...lastError, at: report.startedAt };
  }
}

export function startCollector(options: CollectorOptions): CollectorHandle {
  const status = createIdleCollectorStatus(options.intervalMs);
  status.started = true;
  status.startedAt = new Date().toISOString();

  let stopped = false;
  let inFlight: Promise<void> | null = null;

  console.log(`[Collector] 启动采集循环，间隔 ${options.intervalMs} ms`);

  const tick = (): void => {
    if (stopped) return;
    if (inFlight) {
      console.warn('[Collector] 上一个采集周期尚未结束，跳过本次 tick');
      return;
    }

    inFlight = options
      .runCycle()
      .then((report) => {
        applyCycleReport(status, report);
      })
      .catch((err) => {
        // runCycle 自身已消化 provider / 写入错误，走到这里说明是意外异常
        console.error('[Collector] 采集周期异常:', err);
        status.lastError = {
          stage: 'cycle',
          message: getErrorMessage(err),
          at: new Date().toISOString(),
        };
      })
      .finally(() => {
        inFlight = null;
      });
  };

  // 立即执行一次
  tick();
  const intervalId = setInterval(tick, options.intervalMs);

  return {
    getStatus: () => ({
      ...status,
      lastError: status.lastError ? { ...status.lastError } : null,
      lastReport: status.lastReport
        ? { ...status.lastReport, errors: status.lastReport.errors.map((error) => ({ ...error })) }
        : null,
    }),
    stop: async () => {
      if (!stopped) {
        stopped = true;
        clearInterval(intervalId);
        status.started = false;
        console.log('[Collector] 采集循环已停止调度，等待当前周期结束');
      }
      if (inFlight) {
        await inFlight;
      }
    },
  };
}

// ============================================================
// Collector 运行状态
// ============================================================

export const CYCLE_STATUSES = [
  'written',
  'skipped_fetch',
  'skipped_empty',
] as const;

export type CycleStatus = (typeof CYCLE_STATUSES)[number];

export type CycleErrorStage = 'list' | 'capacity' | 'write' | 'cycle';

export interface CycleError {
  stage: CycleErrorStage;
  message: string;
  nodeName?: string;
}

/** 单次采集周期的结果 */
export interface CycleReport {
  status: CycleStatus;
  startedAt: string;
  nodesListed: number;
  nodesResolved: number;
  nodesSkipped: number;
  rowsWritten: number;
  writeFailures: number;
  clusterCpuUsage: number | null;
  clusterTotalCpu: number | null;
  errors: CycleError[];
}

export interface CollectorStatus {
  started: boolean;
  startedAt: string | null;
  intervalMs: number;
  cyclesRun: number;
  cyclesSkipped: number;
  rowsWritten: number;
  nodesSkipped: number;
  writeFailures: number;
  lastCycleAt: string | null;
  lastError: (CycleError & { at: string }) | null;
  lastReport: CycleReport | null;
}

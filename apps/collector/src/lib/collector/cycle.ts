// ============================================================
// 单次采集周期
// 拉取节点用量 -> 解析节点容量 -> 计算集群汇总 -> 逐节点写入
// 任何 provider / 写入失败都在本周期内消化，不向上抛出
// ============================================================

import type { CycleError, CycleReport, MetricSample, NodeUsage } from '@nodepulse/shared';
import type { NodeMetricsProvider } from '@/lib/kubernetes/provider';
import { computeClusterAggregate, computeNodeCpuUsage, type ResolvedNode } from '@/lib/metrics/aggregate';
import { getErrorMessage } from '@/lib/errors';
import { isSqliteBusyError } from '@/lib/db/sqlite-errors';

export type MetricWriter = {
  append(sample: MetricSample): unknown;
};

export type CollectionCycleInput = {
  provider: NodeMetricsProvider;
  store: MetricWriter;
  now?: () => Date;
};

function createReport(startedAt: string): CycleReport {
  return {
    status: 'written',
    startedAt,
    nodesListed: 0,
    nodesResolved: 0,
    nodesSkipped: 0,
    rowsWritten: 0,
    writeFailures: 0,
    clusterCpuUsage: null,
    clusterTotalCpu: null,
    errors: [],
  };
}

async function resolveNodeCapacity(
  provider: NodeMetricsProvider,
  usage: NodeUsage,
): Promise<ResolvedNode> {
  const capacity = await provider.getNodeCapacity(usage.node_name);
  if (!Number.isFinite(capacity) || capacity <= 0) {
    throw new Error(`CPU capacity 无效: ${capacity}`);
  }
  return { usage, capacity };
}

export async function runCollectionCycle(input: CollectionCycleInput): Promise<CycleReport> {
  const now = input.now ?? (() => new Date());
  const report = createReport(now().toISOString());

  // 1) 节点用量：失败则整个周期跳过，下一次 tick 即重试
  let usages: NodeUsage[];
  try {
    usages = await input.provider.listNodeUsage();
  } catch (error) {
    console.error('[Collector] 获取节点用量失败，跳过本周期:', error);
    report.status = 'skipped_fetch';
    report.errors.push({ stage: 'list', message: getErrorMessage(error) });
    return report;
  }
  report.nodesListed = usages.length;

  // 2) 节点容量：单节点失败只跳过该节点
  const settled = await Promise.allSettled(
    usages.map((usage) => resolveNodeCapacity(input.provider, usage)),
  );
  const resolved: ResolvedNode[] = [];
  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      resolved.push(result.value);
      return;
    }
    const nodeName = usages[index].node_name;
    const message = getErrorMessage(result.reason);
    console.warn(`[Collector] 获取节点 ${nodeName} 容量失败，已跳过: ${message}`);
    report.nodesSkipped += 1;
    report.errors.push({ stage: 'capacity', message, nodeName });
  });
  report.nodesResolved = resolved.length;

  // 3) 集群汇总：没有可用节点时不写入
  const aggregate = computeClusterAggregate(resolved);
  if (!aggregate) {
    report.status = 'skipped_empty';
    return report;
  }
  report.clusterCpuUsage = aggregate.cpuUsage;
  report.clusterTotalCpu = aggregate.totalCpu;

  // 4) 逐节点写入，每行单独打时间戳；单行失败不影响其他行
  for (const node of resolved) {
    const sample: MetricSample = {
      timestamp: now().toISOString(),
      node_name: node.usage.node_name,
      cpu_usage: computeNodeCpuUsage(node),
      memory_usage: node.usage.memory_used,
      is_benchmark: false,
      cluster_cpu_usage: aggregate.cpuUsage,
      cluster_total_cpu: aggregate.totalCpu,
    };
    try {
      input.store.append(sample);
      report.rowsWritten += 1;
    } catch (error) {
      // 写锁竞争单独标记：reset/benchmark 事务或其他进程占用写锁，下个周期通常可恢复
      const busy = isSqliteBusyError(error);
      const failure: CycleError = {
        stage: 'write',
        message: busy ? `database busy: ${getErrorMessage(error)}` : getErrorMessage(error),
        nodeName: node.usage.node_name,
      };
      if (busy) {
        console.warn(`[Collector] 数据库繁忙，节点 ${failure.nodeName} 本周期采样未写入:`, error);
      } else {
        console.error(`[Collector] 写入节点 ${failure.nodeName} 采样失败:`, error);
      }
      report.writeFailures += 1;
      report.errors.push(failure);
    }
  }

  return report;
}

// ============================================================
// CPU 使用率计算
// 节点维度与集群维度（同一周期内成功解析的节点集合）
// ============================================================

import type { NodeUsage } from '@nodepulse/shared';

export type ResolvedNode = {
  usage: NodeUsage;
  /** millicore */
  capacity: number;
};

export type ClusterAggregate = {
  totalCpu: number;
  usedCpu: number;
  cpuUsage: number;
};

export function cpuPercent(used: number, capacity: number): number {
  return (used / capacity) * 100;
}

export function computeNodeCpuUsage(node: ResolvedNode): number {
  return cpuPercent(node.usage.cpu_used, node.capacity);
}

/** 没有可用节点（总容量为 0）时返回 null，本周期不写入 */
export function computeClusterAggregate(nodes: ResolvedNode[]): ClusterAggregate | null {
  let totalCpu = 0;
  let usedCpu = 0;
  for (const node of nodes) {
    totalCpu += node.capacity;
    usedCpu += node.usage.cpu_used;
  }

  if (totalCpu <= 0) return null;

  return {
    totalCpu,
    usedCpu,
    cpuUsage: cpuPercent(usedCpu, totalCpu),
  };
}

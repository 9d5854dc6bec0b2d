// ============================================================
// MetricSample: 节点 CPU / 内存采样
// 每个采集周期每个节点一行，附带该周期的集群汇总值
// ============================================================

export interface MetricSample {
  /** 写入时刻（ISO 8601） */
  timestamp: string;
  node_name: string;
  /** 节点 CPU 使用率（相对节点容量的百分比） */
  cpu_usage: number;
  /** 内存占用（字节） */
  memory_usage: number;
  is_benchmark: boolean;
  /** 同周期集群 CPU 使用率（百分比） */
  cluster_cpu_usage: number;
  /** 同周期集群 CPU 总容量（millicore） */
  cluster_total_cpu: number;
}

/** 带行 ID 的持久化记录，id 即插入顺序 */
export interface StoredMetricSample extends MetricSample {
  id: number;
}

/** metrics provider 返回的单节点用量 */
export interface NodeUsage {
  node_name: string;
  /** millicore */
  cpu_used: number;
  /** bytes */
  memory_used: number;
}

// ============================================================
// 采样存储
// 只支持追加与整表清空；benchmark 通过复制已有行生成
// ============================================================

import { desc, eq, getTableName, sql } from 'drizzle-orm';
import type { MetricSample, StoredMetricSample } from '@nodepulse/shared';
import type { AppDatabase } from '@/lib/db';
import { metrics, type MetricRow, type NewMetricRow } from '@/lib/db/schema';
import { getErrorMessage } from '@/lib/errors';

function toStoredSample(row: MetricRow): StoredMetricSample {
  return {
    id: row.id,
    timestamp: row.timestamp,
    node_name: row.nodeName,
    cpu_usage: row.cpuUsage,
    memory_usage: row.memoryUsage,
    is_benchmark: row.isBenchmark,
    cluster_cpu_usage: row.clusterCpuUsage,
    cluster_total_cpu: row.clusterTotalCpu,
  };
}

function toNewRow(sample: MetricSample): NewMetricRow {
  return {
    timestamp: sample.timestamp,
    nodeName: sample.node_name,
    cpuUsage: sample.cpu_usage,
    memoryUsage: sample.memory_usage,
    isBenchmark: sample.is_benchmark,
    clusterCpuUsage: sample.cluster_cpu_usage,
    clusterTotalCpu: sample.cluster_total_cpu,
  };
}

/** 对外 JSON 结构不带行 ID */
export function toMetricSample(stored: StoredMetricSample): MetricSample {
  const { id: _id, ...sample } = stored;
  return sample;
}

export class MetricStore {
  constructor(private readonly db: AppDatabase) {}

  append(sample: MetricSample): StoredMetricSample {
    try {
      const row = this.db.insert(metrics).values(toNewRow(sample)).returning().get();
      return toStoredSample(row);
    } catch (error) {
      throw new Error(`Failed to insert metric for node ${sample.node_name}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /** 按 timestamp 倒序，同一时刻按 id 倒序 */
  queryAll(): StoredMetricSample[] {
    try {
      return this.db
        .select()
        .from(metrics)
        .orderBy(desc(metrics.timestamp), desc(metrics.id))
        .all()
        .map(toStoredSample);
    } catch (error) {
      throw new Error(`Failed to query metrics: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * 复制最近插入（按 id）的一条非 benchmark 记录并标记为 benchmark。
   * 只复制单行，而不是整个周期的所有节点。
   * 没有可复制的记录时返回 null。
   */
  markBenchmark(): StoredMetricSample | null {
    try {
      return this.db.transaction((tx) => {
        const latest = tx
          .select()
          .from(metrics)
          .where(eq(metrics.isBenchmark, false))
          .orderBy(desc(metrics.id))
          .limit(1)
          .get();
        if (!latest) return null;

        const { id: _id, ...copy } = latest;
        const inserted = tx
          .insert(metrics)
          .values({ ...copy, isBenchmark: true })
          .returning()
          .get();
        return toStoredSample(inserted);
      });
    } catch (error) {
      throw new Error(`Failed to create benchmark: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /** 清空所有记录并回卷自增序列；任一步失败整体回滚 */
  reset(): void {
    try {
      this.db.transaction((tx) => {
        tx.delete(metrics).run();
        tx.run(sql`DELETE FROM sqlite_sequence WHERE name = ${getTableName(metrics)}`);
      });
    } catch (error) {
      throw new Error(`Failed to reset metrics: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  count(): number {
    const result = this.db
      .select({ count: sql<number>`cast(count(*) as integer)` })
      .from(metrics)
      .get();
    return result?.count ?? 0;
  }
}

// ============================================================
// 数据库 Schema 定义 (Drizzle ORM + SQLite)
// ============================================================

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

// ----- 节点采样表（只追加；reset 整表清空并回卷自增序列） -----
export const metrics = sqliteTable(
  'metrics',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: text('timestamp').notNull(),
    nodeName: text('node_name').notNull(),
    /** 节点 CPU 使用率（%） */
    cpuUsage: real('cpu_usage').notNull(),
    /** 内存占用（bytes） */
    memoryUsage: integer('memory_usage').notNull(),
    isBenchmark: integer('is_benchmark', { mode: 'boolean' }).notNull().default(false),
    clusterCpuUsage: real('cluster_cpu_usage').notNull(),
    /** 集群 CPU 总容量（millicore） */
    clusterTotalCpu: integer('cluster_total_cpu').notNull(),
  },
  (table) => [
    index('idx_metrics_timestamp').on(table.timestamp),
  ]
);

export type MetricRow = typeof metrics.$inferSelect;
export type NewMetricRow = typeof metrics.$inferInsert;

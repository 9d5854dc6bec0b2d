// ============================================================
// 建表语句
// 与 schema.ts 中的 metrics 定义保持一致；启动时幂等执行
// ============================================================

export const BOOTSTRAP_SQL = `
  CREATE TABLE IF NOT EXISTS metrics (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    node_name TEXT NOT NULL,
    cpu_usage REAL NOT NULL,
    memory_usage INTEGER NOT NULL,
    is_benchmark INTEGER NOT NULL DEFAULT 0,
    cluster_cpu_usage REAL NOT NULL,
    cluster_total_cpu INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_metrics_timestamp ON metrics (timestamp);
`;

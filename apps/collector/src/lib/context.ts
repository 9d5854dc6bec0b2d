// ============================================================
// 应用依赖容器
// 数据库、存储、provider、采集循环在启动时创建一次，经 runtime 访问器提供给路由
// ============================================================

import type { AppConfig } from '@/lib/config';
import { openDatabase, type DatabaseHandle } from '@/lib/db';
import { MetricStore } from '@/lib/metrics/store';
import type { NodeMetricsProvider } from '@/lib/kubernetes/provider';
import { runCollectionCycle } from '@/lib/collector/cycle';
import { startCollector, type CollectorHandle } from '@/lib/collector/runner';

export type AppContext = {
  config: AppConfig;
  database: DatabaseHandle;
  store: MetricStore;
  provider: NodeMetricsProvider;
  collector: CollectorHandle | null;
};

export function createAppContext(config: AppConfig, provider: NodeMetricsProvider): AppContext {
  const database = openDatabase(config.databasePath);
  console.log(`[Store] 数据库已打开: ${database.path}`);
  return {
    config,
    database,
    store: new MetricStore(database.db),
    provider,
    collector: null,
  };
}

/** 幂等：已启动时返回现有句柄 */
export function ensureCollectorStarted(context: AppContext): CollectorHandle {
  if (context.collector) return context.collector;
  context.collector = startCollector({
    intervalMs: context.config.collectIntervalMs,
    runCycle: () => runCollectionCycle({ provider: context.provider, store: context.store }),
  });
  return context.collector;
}

/** 先停采集（等待当前周期写完），再关闭数据库 */
export async function closeAppContext(context: AppContext): Promise<void> {
  if (context.collector) {
    await context.collector.stop();
  }
  context.database.close();
}

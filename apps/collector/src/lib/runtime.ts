// ============================================================
// 进程级采集运行时
// instrumentation register() 在服务启动时创建 AppContext 并挂到 globalThis，
// 路由处理器与自定义服务器通过同一个访问器取用
// Next 打包后的模块与 server.ts 不共享模块实例，只共享 globalThis
// ============================================================

import { loadConfig, type AppConfig, type EnvSource } from '@/lib/config';
import { closeAppContext, createAppContext, ensureCollectorStarted, type AppContext } from '@/lib/context';
import {
  KubernetesNodeMetricsProvider,
  loadKubeConfig,
  type NodeMetricsProvider,
} from '@/lib/kubernetes/provider';

declare global {
  var __nodepulseAppContext: AppContext | undefined;
}

export type StartAppRuntimeOptions = {
  env?: EnvSource;
  createProvider?: (config: AppConfig) => NodeMetricsProvider;
};

function createKubernetesProvider(config: AppConfig): NodeMetricsProvider {
  return new KubernetesNodeMetricsProvider(loadKubeConfig(config.kubeConfigMode));
}

/** 启动采集运行时（幂等，已启动时返回现有上下文） */
export function startAppRuntime(options: StartAppRuntimeOptions = {}): AppContext {
  const existing = globalThis.__nodepulseAppContext;
  if (existing) return existing;

  const config = loadConfig(options.env);
  const provider = (options.createProvider ?? createKubernetesProvider)(config);
  const context = createAppContext(config, provider);

  if (config.collectorEnabled) {
    ensureCollectorStarted(context);
  } else {
    console.warn('[Runtime] COLLECTOR_ENABLED=false，仅提供查询接口');
  }

  globalThis.__nodepulseAppContext = context;
  return context;
}

export function findAppContext(): AppContext | null {
  return globalThis.__nodepulseAppContext ?? null;
}

export function getAppContext(): AppContext {
  const context = globalThis.__nodepulseAppContext;
  if (!context) {
    throw new Error('App runtime is not started');
  }
  return context;
}

/** 先摘下全局引用再关闭：停止采集（等待当前周期写完）并关闭数据库 */
export async function stopAppRuntime(): Promise<void> {
  const context = globalThis.__nodepulseAppContext;
  if (!context) return;
  globalThis.__nodepulseAppContext = undefined;
  await closeAppContext(context);
}

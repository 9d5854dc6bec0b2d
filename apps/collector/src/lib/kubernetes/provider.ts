// ============================================================
// Node metrics provider
// 从 metrics.k8s.io 读取节点用量，从 core/v1 nodes 读取 CPU 容量
// ============================================================

import { CoreV1Api, KubeConfig, Metrics } from '@kubernetes/client-node';
import type { NodeUsage } from '@nodepulse/shared';
import type { EnvSource, KubeConfigMode } from '@/lib/config';
import { parseCpuMillicores, parseMemoryBytes } from './quantity';

export interface NodeMetricsProvider {
  listNodeUsage(): Promise<NodeUsage[]>;
  /** 返回节点 CPU 容量（millicore） */
  getNodeCapacity(nodeName: string): Promise<number>;
}

/** auto：集群内运行（存在 KUBERNETES_SERVICE_HOST）时使用 ServiceAccount，否则读取 kubeconfig */
export function resolveKubeConfigMode(
  mode: KubeConfigMode,
  env: EnvSource = process.env,
): Exclude<KubeConfigMode, 'auto'> {
  if (mode !== 'auto') return mode;
  return env.KUBERNETES_SERVICE_HOST ? 'in-cluster' : 'default';
}

export function loadKubeConfig(mode: KubeConfigMode): KubeConfig {
  const kubeConfig = new KubeConfig();
  const resolved = resolveKubeConfigMode(mode);
  if (resolved === 'in-cluster') {
    kubeConfig.loadFromCluster();
  } else {
    kubeConfig.loadFromDefault();
  }

  if (!kubeConfig.getCurrentCluster()) {
    throw new Error(`Kubernetes 配置缺少 cluster（mode=${resolved}）`);
  }
  console.log(`[Kubernetes] 已加载集群配置: mode=${resolved}, server=${kubeConfig.getCurrentCluster()?.server}`);
  return kubeConfig;
}

export class KubernetesNodeMetricsProvider implements NodeMetricsProvider {
  private readonly metrics: Metrics;
  private readonly coreApi: CoreV1Api;

  constructor(kubeConfig: KubeConfig) {
    this.metrics = new Metrics(kubeConfig);
    this.coreApi = kubeConfig.makeApiClient(CoreV1Api);
  }

  async listNodeUsage(): Promise<NodeUsage[]> {
    const list = await this.metrics.getNodeMetrics();
    return list.items.map((item) => ({
      node_name: item.metadata.name,
      cpu_used: parseCpuMillicores(item.usage.cpu),
      memory_used: parseMemoryBytes(item.usage.memory),
    }));
  }

  async getNodeCapacity(nodeName: string): Promise<number> {
    const node = await this.coreApi.readNode({ name: nodeName });
    const cpu = node.status?.capacity?.cpu;
    if (!cpu) {
      throw new Error(`节点 ${nodeName} 未上报 CPU capacity`);
    }
    return parseCpuMillicores(cpu);
  }
}

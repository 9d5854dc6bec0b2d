// ============================================================
// 运行配置
// 全部来自环境变量，非法值回退默认值并打印警告
// ============================================================

import path from 'node:path';
import { parseBooleanEnv } from './env-boolean';

export const KUBECONFIG_MODES = ['auto', 'in-cluster', 'default'] as const;

export type KubeConfigMode = (typeof KUBECONFIG_MODES)[number];

export type AppConfig = {
  host: string;
  port: number;
  databasePath: string;
  collectIntervalMs: number;
  collectorEnabled: boolean;
  kubeConfigMode: KubeConfigMode;
};

const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_PORT = 8089;
const DEFAULT_COLLECT_INTERVAL_MS = 1_000;
const MIN_COLLECT_INTERVAL_MS = 100;
const DEFAULT_DATABASE_FILE = path.join('data', 'metrics.db');

export const IN_MEMORY_DATABASE = ':memory:';

export type EnvSource = Record<string, string | undefined>;

export function parsePort(raw: string | undefined): number {
  const parsed = Number(raw);
  if (!raw || !Number.isInteger(parsed)) return DEFAULT_PORT;
  if (parsed < 1 || parsed > 65_535) return DEFAULT_PORT;
  return parsed;
}

export function parseCollectIntervalMs(raw: string | undefined): number {
  const parsed = Number(raw);
  if (!raw || !Number.isFinite(parsed) || parsed <= 0) return DEFAULT_COLLECT_INTERVAL_MS;
  return Math.max(MIN_COLLECT_INTERVAL_MS, Math.floor(parsed));
}

export function parseKubeConfigMode(raw: string | undefined): KubeConfigMode {
  const normalized = (raw || '').trim().toLowerCase();
  const mode = KUBECONFIG_MODES.find((item) => item === normalized);
  return mode ?? 'auto';
}

/** 相对路径按 cwd 解析；:memory: 原样保留 */
export function resolveDatabasePath(raw: string | undefined, cwd: string): string {
  const value = (raw || '').trim();
  if (value === IN_MEMORY_DATABASE) return IN_MEMORY_DATABASE;
  return path.resolve(cwd, value || DEFAULT_DATABASE_FILE);
}

export function loadConfig(
  env: EnvSource = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  if (env.COLLECT_INTERVAL_MS && parseCollectIntervalMs(env.COLLECT_INTERVAL_MS) !== Number(env.COLLECT_INTERVAL_MS)) {
    console.warn(`[Config] COLLECT_INTERVAL_MS=${env.COLLECT_INTERVAL_MS} 无效或过小，已调整为 ${parseCollectIntervalMs(env.COLLECT_INTERVAL_MS)}`);
  }

  return {
    host: (env.HOST || '').trim() || DEFAULT_HOST,
    port: parsePort(env.PORT),
    databasePath: resolveDatabasePath(env.DATABASE_PATH, cwd),
    collectIntervalMs: parseCollectIntervalMs(env.COLLECT_INTERVAL_MS),
    collectorEnabled: parseBooleanEnv(env.COLLECTOR_ENABLED) ?? true,
    kubeConfigMode: parseKubeConfigMode(env.KUBECONFIG_MODE),
  };
}

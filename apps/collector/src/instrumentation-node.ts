// ============================================================
// Node.js runtime 专用的采集运行时启动逻辑
// 由 instrumentation.ts 在 NEXT_RUNTIME === 'nodejs' 时动态导入
// （runtime -> kubernetes client / better-sqlite3 等 Node 专用依赖）
// ============================================================

import { startAppRuntime } from '@/lib/runtime';

// 构建阶段不启动，避免 setInterval 挂住 next build 进程
const phase = process.env.NEXT_PHASE || '';
const isBuildPhase =
  phase.includes('build') || process.argv.some((arg) => arg.includes('build'));

if (!isBuildPhase) {
  try {
    const context = startAppRuntime();
    console.log(`[instrumentation] 采集运行时已启动，间隔 ${context.config.collectIntervalMs} ms`);
  } catch (error) {
    // 配置、集群或数据库不可用时不对外提供服务
    console.error('[instrumentation] 启动采集运行时失败:', error);
    process.exit(1);
  }
}

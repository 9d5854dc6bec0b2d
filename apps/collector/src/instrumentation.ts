// ============================================================
// Next.js Server Instrumentation Hook
// 通过 NEXT_RUNTIME 条件动态导入 Node.js 专用的启动逻辑，
// Edge 编译时不会追踪 instrumentation-node.ts 的依赖链
// ============================================================

export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    await import('./instrumentation-node');
  }
}

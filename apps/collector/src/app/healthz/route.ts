// ============================================================
// API: 健康检查
// GET /healthz
// ============================================================

import { apiJson } from '@/lib/http/api-response';
import { getErrorMessage } from '@/lib/errors';
import { createIdleCollectorStatus } from '@/lib/collector/runner';
import { findAppContext, getAppContext } from '@/lib/runtime';

export async function GET() {
  const checkedAt = new Date().toISOString();
  const context = findAppContext();
  const collector = context
    ? context.collector?.getStatus() ?? createIdleCollectorStatus(context.config.collectIntervalMs)
    : null;

  try {
    const rows = getAppContext().store.count();
    return apiJson({
      status: 'ok',
      checkedAt,
      database: { ok: true, rows },
      collector,
    });
  } catch (err) {
    console.error('[API] 健康检查失败:', err);
    return apiJson(
      {
        status: 'degraded',
        checkedAt,
        database: { ok: false, error: getErrorMessage(err) },
        collector,
      },
      { status: 503 }
    );
  }
}

// ============================================================
// API: 采样历史
// GET /metrics
// ============================================================

import { apiInternalError, apiJson } from '@/lib/http/api-response';
import { getErrorMessage } from '@/lib/errors';
import { toMetricSample } from '@/lib/metrics/store';
import { getAppContext } from '@/lib/runtime';

export async function GET() {
  try {
    const rows = getAppContext().store.queryAll();
    return apiJson(rows.map(toMetricSample));
  } catch (error) {
    console.error('[API] 读取采样失败:', error);
    return apiInternalError(getErrorMessage(error));
  }
}

// ============================================================
// API: 清空采样历史
// POST /metrics/reset
// ============================================================

import { apiEmpty, apiInternalError } from '@/lib/http/api-response';
import { getErrorMessage } from '@/lib/errors';
import { getAppContext } from '@/lib/runtime';

export async function POST() {
  try {
    getAppContext().store.reset();
    console.log('[API] 采样历史已清空');
    return apiEmpty(200);
  } catch (error) {
    console.error('[API] 清空采样历史失败:', error);
    return apiInternalError(getErrorMessage(error));
  }
}

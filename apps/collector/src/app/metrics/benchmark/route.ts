// ============================================================
// API: 将最近一条采样复制为 benchmark
// POST /metrics/benchmark
// ============================================================

import { apiEmpty, apiInternalError } from '@/lib/http/api-response';
import { getErrorMessage } from '@/lib/errors';
import { getAppContext } from '@/lib/runtime';

export async function POST() {
  try {
    const copy = getAppContext().store.markBenchmark();
    if (copy) {
      console.log(`[API] 已创建 benchmark: id=${copy.id}, node=${copy.node_name}`);
    } else {
      console.log('[API] 没有可复制的采样，benchmark 未创建');
    }
    return apiEmpty(201);
  } catch (error) {
    console.error('[API] 创建 benchmark 失败:', error);
    return apiInternalError(getErrorMessage(error));
  }
}

// ============================================================
// HTTP 响应构造
// 成功时直接返回数据；失败统一为 { error: message }
// ============================================================

import { NextResponse } from 'next/server.js';

export function apiJson<T>(data: T, init?: ResponseInit): NextResponse {
  return NextResponse.json(data, init);
}

export function apiEmpty(status: number): NextResponse {
  return new NextResponse(null, { status });
}

export function apiError(message: string, options?: { status?: number }): NextResponse {
  return NextResponse.json(
    { error: message },
    { status: options?.status ?? 500 },
  );
}

export function apiInternalError(message: string): NextResponse {
  return apiError(message, { status: 500 });
}

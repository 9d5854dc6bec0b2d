function readErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : null;
  }
  return null;
}

function isBusyCode(code: string | null): boolean {
  return code !== null && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

/**
 * 写锁竞争：SQLITE_BUSY / SQLITE_LOCKED 及其扩展码。
 * MetricStore 会把驱动错误包一层再抛出，所以沿 cause 链向下查找。
 */
export function isSqliteBusyError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth += 1) {
    if (isBusyCode(readErrorCode(current))) return true;
    if (current instanceof Error) {
      if (current.message.includes('database is locked')) return true;
      current = current.cause;
    } else {
      return false;
    }
  }
  return false;
}

// ============================================================
// Kubernetes resource quantity 解析
// CPU 换算为 millicore，内存换算为 bytes，均向上取整
// ============================================================

const QUANTITY_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+))([eE][+-]?\d+)?(Ki|Mi|Gi|Ti|Pi|Ei|n|u|m|k|M|G|T|P|E)?$/;

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  '': 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60,
};

// 浮点误差会把 0.1 * 1000 算成 100.00000000000001，向上取整前先抹掉
const ROUNDING_TOLERANCE = 1e-9;

function ceilTolerant(value: number): number {
  const rounded = Math.round(value);
  if (Math.abs(value - rounded) < ROUNDING_TOLERANCE) return rounded;
  return Math.ceil(value);
}

/** 解析为基本单位（核 / 字节）的浮点值 */
export function parseQuantity(raw: string): number {
  const match = QUANTITY_PATTERN.exec(raw.trim());
  if (!match) {
    throw new Error(`无法解析 quantity: "${raw}"`);
  }

  const [, mantissa, exponent = '', suffix = ''] = match;
  const value = Number(`${mantissa}${exponent}`);
  const multiplier = SUFFIX_MULTIPLIERS[suffix];
  if (!Number.isFinite(value) || multiplier === undefined) {
    throw new Error(`无法解析 quantity: "${raw}"`);
  }
  return value * multiplier;
}

export function parseCpuMillicores(raw: string): number {
  return ceilTolerant(parseQuantity(raw) * 1000);
}

export function parseMemoryBytes(raw: string): number {
  return ceilTolerant(parseQuantity(raw));
}

// ── Statistics Helpers ──────────────────────────────────────────────
// Small closed-form routines shared by the trend, anomaly, projection
// and score modules.

export interface LinearFit {
  slope: number;
  intercept: number;
  /** Coefficient of determination. 1 when the series has no variance. */
  rSquared: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * True when every value equals the first. A variance computed from
 * identical fractions such as 0.1 can land just above 0.
 */
export function isConstant(values: readonly number[]): boolean {
  return values.every((v) => v === values[0]);
}

/** Sample standard deviation (n - 1). Returns 0 for fewer than two values or a constant series. */
export function sampleStdDev(values: readonly number[]): number {
  const n = values.length;
  if (n < 2 || isConstant(values)) return 0;
  const m = mean(values);

  let variance = 0;
  for (const v of values) {
    variance += (v - m) ** 2;
  }
  return Math.sqrt(variance / (n - 1));
}

/**
 * Ordinary least-squares fit of `ys` against their indices 0..n-1.
 * Callers must pass at least two values.
 */
export function fitLinear(ys: readonly number[]): LinearFit {
  const n = ys.length;
  if (isConstant(ys)) return { slope: 0, intercept: ys[0] ?? 0, rSquared: 1 };

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;

  for (let i = 0; i < n; i++) {
    const y = ys[i]!;
    sumX += i;
    sumY += y;
    sumXY += i * y;
    sumXX += i * i;
  }

  const denominator = n * sumXX - sumX * sumX;
  const slope = denominator === 0 ? 0 : (n * sumXY - sumX * sumY) / denominator;
  const intercept = (sumY - slope * sumX) / n;

  const meanY = sumY / n;
  let ssTot = 0;
  let ssRes = 0;
  for (let i = 0; i < n; i++) {
    const y = ys[i]!;
    ssTot += (y - meanY) ** 2;
    ssRes += (y - (intercept + slope * i)) ** 2;
  }

  const rSquared = Math.max(0, 1 - ssRes / ssTot);

  return { slope, intercept, rSquared };
}

export function round(n: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(n * factor) / factor;
}

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

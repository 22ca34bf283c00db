/**
 * Numeric helpers for feature math and exchange-filter rounding.
 */

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Population std from running sums. */
export function stddevFromSums(sum: number, sumSq: number, n: number): number {
  if (n <= 0) return 0;
  const avg = sum / n;
  const variance = sumSq / n - avg * avg;
  return variance > 0 ? Math.sqrt(variance) : 0;
}

export function sign(value: number): -1 | 0 | 1 {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

/** Number of decimals in a filter step such as 0.001 or 1e-8. */
export function decimalsOf(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 0;
  const text = step.toString();
  const exp = /e-(\d+)$/.exec(text);
  if (exp) return Number(exp[1]);
  const dot = text.indexOf(".");
  return dot === -1 ? 0 : text.length - dot - 1;
}

// Epsilon guards against 0.3 / 0.1 = 2.9999999999999996
export function floorToStep(value: number, step: number): number {
  if (step <= 0) return value;
  const units = Math.floor(value / step + 1e-9);
  return Number((units * step).toFixed(decimalsOf(step)));
}

export function roundToStep(value: number, step: number): number {
  if (step <= 0) return value;
  const units = Math.round(value / step);
  return Number((units * step).toFixed(decimalsOf(step)));
}

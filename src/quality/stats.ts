/**
 * Quantile by linear interpolation between closest ranks
 * (position = q · (n − 1) on the sorted values).
 * Returns NaN for an empty array.
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = q * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export interface IqrBounds {
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
}

/** Tukey fences: [Q1 − k·IQR, Q3 + k·IQR]. */
export function iqrBounds(values: number[], k: number = 1.5): IqrBounds {
  const q1 = quantile(values, 0.25);
  const q3 = quantile(values, 0.75);
  const iqr = q3 - q1;
  return { q1, q3, iqr, lower: q1 - k * iqr, upper: q3 + k * iqr };
}

/** Count of values strictly outside the fences; 0 for an empty array. */
export function countIqrOutliers(values: number[], k: number = 1.5): number {
  if (values.length === 0) return 0;
  const { lower, upper } = iqrBounds(values, k);
  return values.filter((v) => v < lower || v > upper).length;
}

export function round(value: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function mean(values: number[]): number | null {
  return values.length ? sum(values) / values.length : null;
}

/** Sample standard deviation (n - 1); null for fewer than two values. */
export function sampleStd(values: number[]): number | null {
  if (values.length < 2) return null;
  const m = sum(values) / values.length;
  const variance =
    values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/** Quantile with linear interpolation between closest ranks. */
export function quantile(values: number[], q: number): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

/** Non-null values of `key` across rows, in row order. */
export function valuesOf<T, K extends keyof T>(
  rows: T[],
  key: K,
): Array<NonNullable<T[K]>> {
  const out: Array<NonNullable<T[K]>> = [];
  for (const row of rows) {
    const v = row[key];
    if (v != null) out.push(v);
  }
  return out;
}

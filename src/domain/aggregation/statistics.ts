/**
 * Descriptive statistics over plain number arrays. Callers strip missing
 * values first; every function here assumes finite inputs.
 */

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function mean(values: readonly number[]): number | null {
  return values.length > 0 ? sum(values) / values.length : null;
}

/** Linear-interpolated quantile (q in 0..1), matching the common "type 7" definition. */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function median(values: readonly number[]): number | null {
  return quantile(values, 0.5);
}

/** Sample standard deviation (n - 1). Null below two values. */
export function std(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const m = sum(values) / values.length;
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  return Math.sqrt(ss / (values.length - 1));
}

/**
 * Percentile rank of every value within its own array, in 0..1, ties
 * sharing their average rank. A single value ranks 1.
 */
export function percentileRanks(values: readonly number[]): number[] {
  const n = values.length;
  if (n === 0) return [];
  const order = values
    .map((v, i) => ({ v, i }))
    .sort((a, b) => a.v - b.v);
  const ranks = new Array<number>(n);
  let start = 0;
  while (start < n) {
    let end = start;
    while (end + 1 < n && order[end + 1].v === order[start].v) end++;
    // 1-based average rank of the tie group
    const avg = (start + end) / 2 + 1;
    for (let k = start; k <= end; k++) ranks[order[k].i] = avg / n;
    start = end + 1;
  }
  return ranks;
}

/** Pearson correlation coefficient; null when undefined (n < 2 or zero variance). */
export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;
  const mx = sum(xs.slice(0, n)) / n;
  const my = sum(ys.slice(0, n)) / n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return null;
  const r = sxy / Math.sqrt(sxx * syy);
  return Math.max(-1, Math.min(1, r));
}

export function round(value: number, decimals = 2): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

/** Equal-width histogram bins over [min, max]. The last bin is closed. */
export function histogram(
  values: readonly number[],
  bins: number,
  min: number,
  max: number,
): { from: number; to: number; count: number }[] {
  const width = (max - min) / bins;
  const result = Array.from({ length: bins }, (_, i) => ({
    from: round(min + i * width),
    to: round(min + (i + 1) * width),
    count: 0,
  }));
  if (width <= 0) return result;
  for (const v of values) {
    if (v < min || v > max) continue;
    const idx = Math.min(bins - 1, Math.floor((v - min) / width));
    result[idx].count++;
  }
  return result;
}

/** Code-unit string order, independent of the host locale. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

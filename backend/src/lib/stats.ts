// Numeric helpers shared by aggregation, scoring and comparison

export function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const ordered = [...values].sort((a, b) => a - b);
  const mid = Math.floor(ordered.length / 2);
  return ordered.length % 2 === 1 ? ordered[mid] : (ordered[mid - 1] + ordered[mid]) / 2;
}

// Linear interpolation between closest ranks
export function percentile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const ordered = [...values].sort((a, b) => a - b);
  if (ordered.length === 1) return ordered[0];
  const pos = (ordered.length - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.min(lower + 1, ordered.length - 1);
  const weight = pos - lower;
  return ordered[lower] * (1 - weight) + ordered[upper] * weight;
}

export interface Spread {
  min: number;
  median: number;
  max: number;
  iqr: number;
}

export function spread(values: readonly number[]): Spread {
  if (values.length === 0) return { min: 0, median: 0, max: 0, iqr: 0 };
  return {
    min: Math.min(...values),
    median: median(values),
    max: Math.max(...values),
    iqr: round6(percentile(values, 0.75) - percentile(values, 0.25)),
  };
}

// Code-unit ordering, independent of the host locale
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

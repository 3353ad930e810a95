export interface SeriesSummary {
  count: number;
  mean: number;
  std: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  return sum(values) / values.length;
}

export function extent(values: readonly number[]): { min: number; max: number } {
  if (values.length === 0) {
    throw new Error('No values present.');
  }
  return values.reduce(
    (bounds, value) => ({ min: Math.min(bounds.min, value), max: Math.max(bounds.max, value) }),
    { min: Number.POSITIVE_INFINITY, max: Number.NEGATIVE_INFINITY }
  );
}

/** Sample standard deviation (n - 1 denominator); NaN below two values. */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) {
    return Number.NaN;
  }
  const avg = mean(values);
  const squared = values.reduce((total, value) => total + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/** Linear interpolation between closest ranks. `sorted` must be ascending. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return Number.NaN;
  }
  const position = (sorted.length - 1) * q;
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex] ?? Number.NaN;
  const upper = sorted[upperIndex] ?? Number.NaN;
  return lower + (upper - lower) * (position - lowerIndex);
}

export function describe(values: readonly number[]): SeriesSummary {
  if (values.length === 0) {
    throw new Error('Cannot summarize an empty series.');
  }
  const sorted = [...values].sort((a, b) => a - b);
  return {
    count: sorted.length,
    mean: mean(sorted),
    std: sampleStdDev(sorted),
    min: sorted[0] ?? Number.NaN,
    q1: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q3: quantile(sorted, 0.75),
    max: sorted[sorted.length - 1] ?? Number.NaN
  };
}

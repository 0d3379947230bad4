import type { ResourceStats } from './types.js';

/** Multiple of the median above which a maximum counts as an extreme outlier. */
export const EXTREME_OUTLIER_MEDIAN_MULTIPLE = 500;

const sortAsc = (values: readonly number[]): number[] => [...values].sort((a, b) => a - b);

const assertPercent = (p: number): void => {
  if (!Number.isFinite(p) || p < 0 || p > 100) {
    throw new RangeError(`percentile must be within [0, 100], received ${p}`);
  }
};

export const average = (samples: readonly number[]): number | undefined => {
  if (samples.length === 0) return undefined;
  return samples.reduce((sum, value) => sum + value, 0) / samples.length;
};

/**
 * Linear-interpolated percentile at rank `(p/100)*(n-1)` over ascending samples.
 * Returns `undefined` for an empty sample set; throws for `p` outside [0, 100].
 */
export const percentile = (samples: readonly number[], p: number): number | undefined => {
  assertPercent(p);
  if (samples.length === 0) return undefined;
  const sorted = sortAsc(samples);
  if (sorted.length === 1) return sorted[0];
  const rank = (p / 100) * (sorted.length - 1);
  const low = Math.floor(rank);
  const high = Math.min(Math.ceil(rank), sorted.length - 1);
  if (low === high) return sorted[low];
  const weight = rank - low;
  return sorted[low] + weight * (sorted[high] - sorted[low]);
};

/** Nearest-rank percentile (1-based rank `ceil(p/100*n)`), more sensitive to isolated spikes. */
export const nearestRankPercentile = (samples: readonly number[], p: number): number | undefined => {
  assertPercent(p);
  if (samples.length === 0) return undefined;
  const sorted = sortAsc(samples);
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(Math.max(rank, 0), sorted.length - 1)];
};

export const maxOf = (samples: readonly number[]): number | undefined =>
  samples.length === 0 ? undefined : samples.reduce((max, value) => (value > max ? value : max), samples[0]);

export const spikeRatio = (samples: readonly number[]): number | undefined => {
  const p95 = nearestRankPercentile(samples, 95);
  const max = maxOf(samples);
  if (p95 === undefined || max === undefined) return undefined;
  if (p95 === 0) {
    return max === 0 ? 1 : Number.POSITIVE_INFINITY;
  }
  return max / p95;
};

const isExtremeOutlier = (max: number, median: number): boolean =>
  median > 0 && max / median >= EXTREME_OUTLIER_MEDIAN_MULTIPLE;

/**
 * Burst test: the interpolated P95 ratio reaches the threshold, or the maximum
 * is an extreme outlier against the median. A moderate single spike over a flat
 * baseline passes neither, whatever its nearest-rank spike ratio.
 */
export const isBursty = (samples: readonly number[], ratioThreshold: number): boolean => {
  const max = maxOf(samples);
  const p95 = percentile(samples, 95);
  const median = percentile(samples, 50);
  if (max === undefined || p95 === undefined || median === undefined) return false;

  if (p95 !== 0 && max / p95 >= ratioThreshold) return true;
  return isExtremeOutlier(max, median);
};

/**
 * Percentile after dropping samples above `spikeFactor` times the median.
 * With a zero median every sample is kept.
 */
export const sustainedPercentile = (samples: readonly number[], p: number, spikeFactor: number): number | undefined => {
  const median = percentile(samples, 50);
  if (median === undefined) return undefined;
  if (median <= 0) return percentile(samples, p);
  const ceiling = median * spikeFactor;
  return percentile(
    samples.filter((value) => value <= ceiling),
    p,
  );
};

export const toResourceStats = (samples: readonly number[]): ResourceStats | undefined => {
  const avg = average(samples);
  const p95 = percentile(samples, 95);
  const p99 = percentile(samples, 99);
  const p100 = percentile(samples, 100);
  if (avg === undefined || p95 === undefined || p99 === undefined || p100 === undefined) return undefined;
  return { avg, p95, p99, p100 };
};

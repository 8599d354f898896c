/**
 * Percentile of an ascending-sorted array by linear interpolation between
 * the closest ranks: rank = p/100 * (n - 1).
 *
 * Returns null for an empty array.
 */
export function percentile(sorted: readonly number[], p: number): number | null {
  if (sorted.length === 0) return null;
  if (sorted.length === 1) return sorted[0];

  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  if (lower === upper) return sorted[lower];

  const fraction = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

export interface LatencyStats {
  avg: number;
  min: number;
  max: number;
  p95: number;
}

export function latencyStats(latencies: readonly number[]): LatencyStats | null {
  if (latencies.length === 0) return null;

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, v) => acc + v, 0);

  const min = sorted[0];
  const max = sorted[sorted.length - 1];

  return {
    // float summation can land a hair outside [min, max]
    avg: Math.min(max, Math.max(min, sum / sorted.length)),
    min,
    max,
    p95: percentile(sorted, 95) ?? max,
  };
}

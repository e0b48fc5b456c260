/**
 * postsignal - Descriptive Statistics
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Standard deviation
 *
 * @param sample - Divide by n-1 instead of n (0 for fewer than 2 values)
 */
export function standardDeviation(values: readonly number[], sample = false): number {
  const n = values.length;
  if (n === 0 || (sample && n < 2)) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (sample ? n - 1 : n));
}

/**
 * Percentile with linear interpolation between closest ranks
 *
 * @param p - Percentile between 0 and 100
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/** Round to fixed decimals; never returns -0 */
export function round(value: number, decimals = 3): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor || 0;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Running statistics algebra
 *
 * `RunningStats` carries only sums, sums of squares, counts and extrema, so
 * merging two of them is exact: sums add and extrema fold, with `null` as
 * the identity for min/max. Means and population standard deviations are
 * derived on read and are `null` when their divisor is zero.
 *
 * Merging is commutative and associative up to floating-point rounding of
 * the non-integer sums.
 */

import type { RunningStats } from "../../types";

/**
 * Statistics of an empty stream
 */
export const EMPTY_STATS: RunningStats = Object.freeze({
  count: 0,
  sumLength: 0,
  sumSquaresLength: 0,
  minLength: null,
  maxLength: null,
  sumGC: 0,
  sumSquaresGC: 0,
  sumQuality: 0,
  sumSquaresQuality: 0,
  minQuality: null,
  maxQuality: null,
});

/**
 * Smaller of two optional extrema
 */
export function minOf(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

/**
 * Larger of two optional extrema
 */
export function maxOf(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

/**
 * Merge two sets of running statistics
 */
export function mergeStats(a: RunningStats, b: RunningStats): RunningStats {
  return {
    count: a.count + b.count,
    sumLength: a.sumLength + b.sumLength,
    sumSquaresLength: a.sumSquaresLength + b.sumSquaresLength,
    minLength: minOf(a.minLength, b.minLength),
    maxLength: maxOf(a.maxLength, b.maxLength),
    sumGC: a.sumGC + b.sumGC,
    sumSquaresGC: a.sumSquaresGC + b.sumSquaresGC,
    sumQuality: a.sumQuality + b.sumQuality,
    sumSquaresQuality: a.sumSquaresQuality + b.sumSquaresQuality,
    minQuality: minOf(a.minQuality, b.minQuality),
    maxQuality: maxOf(a.maxQuality, b.maxQuality),
  };
}

/**
 * Mean of `n` observations summing to `sum`
 */
export function meanOf(sum: number, n: number): number | null {
  return n > 0 ? sum / n : null;
}

/**
 * Population standard deviation from a sum and sum of squares
 *
 * The variance is clamped at zero to absorb rounding in `E[x²] - E[x]²`.
 */
export function stdDevOf(sum: number, sumSquares: number, n: number): number | null {
  if (n <= 0) return null;
  const mean = sum / n;
  return Math.sqrt(Math.max(0, sumSquares / n - mean * mean));
}

/**
 * Mean read length
 */
export function meanLength(stats: RunningStats): number | null {
  return meanOf(stats.sumLength, stats.count);
}

/**
 * Mean per-read GC percentage
 */
export function meanGC(stats: RunningStats): number | null {
  return meanOf(stats.sumGC, stats.count);
}

/**
 * Mean per-base quality score
 *
 * Every valid read has one score per base, so the base count is `sumLength`.
 */
export function meanQuality(stats: RunningStats): number | null {
  return meanOf(stats.sumQuality, stats.sumLength);
}

/**
 * Population standard deviation of read length
 */
export function stdDevLength(stats: RunningStats): number | null {
  return stdDevOf(stats.sumLength, stats.sumSquaresLength, stats.count);
}

/**
 * Population standard deviation of per-read GC percentage
 */
export function stdDevGC(stats: RunningStats): number | null {
  return stdDevOf(stats.sumGC, stats.sumSquaresGC, stats.count);
}

/**
 * Population standard deviation of per-base quality
 */
export function stdDevQuality(stats: RunningStats): number | null {
  return stdDevOf(stats.sumQuality, stats.sumSquaresQuality, stats.sumLength);
}

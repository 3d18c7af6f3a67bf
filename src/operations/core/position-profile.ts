/**
 * Per-position quality profile
 *
 * Quality statistics and base composition for the first K read positions,
 * held in fixed-size typed arrays so memory stays bounded no matter how
 * long the reads are. Positions past K are ignored. Reads always start at
 * position 0, so the covered positions form a prefix `0..covered-1`.
 */

import type { BaseCounts, PositionProfile, PositionStats } from "../../types";
import { maxOf, minOf } from "./running-stats";

const BASE_SLOTS = 5;

/**
 * Slot of an upper-case base in a 5-wide composition row (A, C, G, T, N)
 */
function baseSlot(code: number): number {
  switch (code) {
    case 65:
      return 0;
    case 67:
      return 1;
    case 71:
      return 2;
    case 84:
      return 3;
    default:
      return 4;
  }
}

/**
 * Mutable profile table filled by the accumulator
 *
 * @example
 * ```typescript
 * const table = new PositionProfileTable(100);
 * table.fold("ACGT", [30, 31, 32, 33]);
 * table.snapshot().positions.length; // 4
 * ```
 */
export class PositionProfileTable {
  private readonly counts: Float64Array;
  private readonly sums: Float64Array;
  private readonly sumSquares: Float64Array;
  private readonly mins: Float64Array;
  private readonly maxs: Float64Array;
  private readonly bases: Float64Array;
  private covered = 0;

  constructor(readonly limit: number) {
    this.counts = new Float64Array(limit);
    this.sums = new Float64Array(limit);
    this.sumSquares = new Float64Array(limit);
    this.mins = new Float64Array(limit).fill(Number.POSITIVE_INFINITY);
    this.maxs = new Float64Array(limit).fill(Number.NEGATIVE_INFINITY);
    this.bases = new Float64Array(limit * BASE_SLOTS);
  }

  /**
   * Add one read's bases and scores
   *
   * @param bases - Upper-case bases of the read
   * @param scores - One Phred score per base
   *
   * @performance O(min(length, K))
   */
  fold(bases: string, scores: readonly number[]): void {
    const n = Math.min(scores.length, bases.length, this.limit);

    for (let i = 0; i < n; i++) {
      const score = scores[i] ?? 0;
      this.counts[i] = (this.counts[i] ?? 0) + 1;
      this.sums[i] = (this.sums[i] ?? 0) + score;
      this.sumSquares[i] = (this.sumSquares[i] ?? 0) + score * score;
      if (score < (this.mins[i] ?? Number.POSITIVE_INFINITY)) this.mins[i] = score;
      if (score > (this.maxs[i] ?? Number.NEGATIVE_INFINITY)) this.maxs[i] = score;

      const slot = i * BASE_SLOTS + baseSlot(bases.charCodeAt(i));
      this.bases[slot] = (this.bases[slot] ?? 0) + 1;
    }

    if (n > this.covered) this.covered = n;
  }

  /**
   * Copy the table into its serializable form
   */
  snapshot(): PositionProfile {
    const positions: PositionStats[] = [];
    for (let i = 0; i < this.covered; i++) {
      const row = i * BASE_SLOTS;
      positions.push({
        count: this.counts[i] ?? 0,
        sumQuality: this.sums[i] ?? 0,
        sumSquaresQuality: this.sumSquares[i] ?? 0,
        minQuality: this.mins[i] ?? 0,
        maxQuality: this.maxs[i] ?? 0,
        bases: {
          A: this.bases[row] ?? 0,
          C: this.bases[row + 1] ?? 0,
          G: this.bases[row + 2] ?? 0,
          T: this.bases[row + 3] ?? 0,
          N: this.bases[row + 4] ?? 0,
        },
      });
    }
    return { limit: this.limit, positions };
  }
}

/**
 * Add two base composition tallies
 */
export function addBaseCounts(a: BaseCounts, b: BaseCounts): BaseCounts {
  return { A: a.A + b.A, C: a.C + b.C, G: a.G + b.G, T: a.T + b.T, N: a.N + b.N };
}

function mergePosition(a: PositionStats | undefined, b: PositionStats | undefined): PositionStats | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return {
    count: a.count + b.count,
    sumQuality: a.sumQuality + b.sumQuality,
    sumSquaresQuality: a.sumSquaresQuality + b.sumSquaresQuality,
    minQuality: minOf(a.minQuality, b.minQuality) ?? a.minQuality,
    maxQuality: maxOf(a.maxQuality, b.maxQuality) ?? a.maxQuality,
    bases: addBaseCounts(a.bases, b.bases),
  };
}

/**
 * Merge two profiles position by position
 *
 * The merged limit is the smaller of the two; positions beyond it are
 * dropped from both sides.
 */
export function mergeProfiles(a: PositionProfile, b: PositionProfile): PositionProfile {
  const limit = Math.min(a.limit, b.limit);
  const covered = Math.min(limit, Math.max(a.positions.length, b.positions.length));

  const positions: PositionStats[] = [];
  for (let i = 0; i < covered; i++) {
    const merged = mergePosition(a.positions[i], b.positions[i]);
    if (merged !== undefined) positions.push(merged);
  }
  return { limit, positions };
}

/**
 * Mean quality at each covered position
 */
export function positionMeans(profile: PositionProfile): number[] {
  return profile.positions.map((position) => position.sumQuality / position.count);
}

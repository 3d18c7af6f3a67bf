/**
 * Deterministic stride sampling
 *
 * A lightweight stand-in for reservoir sampling when results must merge
 * across chunks: every `stride`-th validated record contributes its GC
 * percentage and its leading quality scores until each buffer is full.
 * Nothing is ever evicted, so early records are over-represented in long
 * chunks. The buffers approximate the distributions for plotting; exact
 * figures come from the running statistics and histograms instead.
 */

import type { SampleReservoir } from "../../types";

/**
 * Settings of a stride sampler
 */
export interface StrideSamplerOptions {
  readonly stride: number;
  readonly gcCap: number;
  readonly qualityCap: number;
  /** Leading scores taken from each sampled record */
  readonly qualityPositions: number;
}

/**
 * Per-chunk stride sampler
 *
 * @example
 * ```typescript
 * const sampler = new StrideSampler({ stride: 2, gcCap: 10, qualityCap: 10, qualityPositions: 2 });
 * sampler.offer(0, 50, [30, 31, 32]); // sampled
 * sampler.offer(1, 40, [20, 21]);     // skipped
 * sampler.snapshot().quality;        // [30, 31]
 * ```
 */
export class StrideSampler {
  private readonly gc: number[] = [];
  private readonly quality: number[] = [];

  constructor(private readonly options: StrideSamplerOptions) {}

  /**
   * Offer the `index`-th validated record (0-based) of the chunk
   *
   * @returns Whether the record was sampled
   */
  offer(index: number, gcPercent: number, scores: readonly number[]): boolean {
    if (index % this.options.stride !== 0) return false;

    if (this.gc.length < this.options.gcCap) {
      this.gc.push(gcPercent);
    }

    const room = this.options.qualityCap - this.quality.length;
    const take = Math.min(room, this.options.qualityPositions, scores.length);
    for (let i = 0; i < take; i++) {
      this.quality.push(scores[i] ?? 0);
    }
    return true;
  }

  snapshot(): SampleReservoir {
    return {
      stride: this.options.stride,
      gcCap: this.options.gcCap,
      qualityCap: this.options.qualityCap,
      gc: [...this.gc],
      quality: [...this.quality],
    };
  }
}

/**
 * Reduce `values` to at most `cap` evenly spaced elements
 *
 * Picks index `floor(i * n / cap)` for `i` in `0..cap-1`, keeping the
 * first element and preserving order.
 */
export function thinEvenly(values: readonly number[], cap: number): number[] {
  const n = values.length;
  if (n <= cap) return [...values];

  const thinned: number[] = [];
  for (let i = 0; i < cap; i++) {
    thinned.push(values[Math.floor((i * n) / cap)] ?? 0);
  }
  return thinned;
}

/**
 * Merge reservoirs into one capped at `cap` per buffer
 *
 * Inputs are concatenated in the order given, so callers pass them in a
 * fixed order (the reducer sorts by source identifier) to get a result
 * that does not depend on completion order.
 */
export function mergeReservoirs(reservoirs: readonly SampleReservoir[], cap: number): SampleReservoir {
  const gc: number[] = [];
  const quality: number[] = [];
  let stride = 1;

  for (const reservoir of reservoirs) {
    gc.push(...reservoir.gc);
    quality.push(...reservoir.quality);
    stride = Math.max(stride, reservoir.stride);
  }

  return {
    stride,
    gcCap: cap,
    qualityCap: cap,
    gc: thinEvenly(gc, cap),
    quality: thinEvenly(quality, cap),
  };
}

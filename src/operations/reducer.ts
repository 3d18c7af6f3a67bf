/**
 * Reduction of chunk results into one combined result
 *
 * Counts, sums, sums of squares, histograms, composition, discard
 * counters and the read-filter count add; extrema fold with `null` as identity; position profiles
 * merge per position. All of these are exact, so the combined figures do
 * not depend on how the file was chunked or in which order chunks
 * finished. Sample reservoirs are the exception: they are concatenated in
 * source order and thinned evenly, which approximates a file-wide sample.
 * Inputs are ordered by their identifier and then by the identifiers of
 * the chunks they cover, so combined inputs sharing a label still merge
 * the same way whatever order they arrive in.
 *
 * A CombinedResult is itself accepted as input, so reductions can be
 * nested (chunk → file → run).
 *
 * @module operations/reducer
 */

import { EmptyInputError } from "../errors";
import { QUALITY_THRESHOLDS } from "../formats/fastq/constants";
import type {
  ChunkResult,
  ChunkSummary,
  CombinedResult,
  DiscardCounts,
  QcResult,
  ReducerOptions,
  ResultBody,
} from "../types";
import { deepFreeze } from "./core/freeze";
import { addBaseCounts, mergeProfiles, positionMeans } from "./core/position-profile";
import { mergeReservoirs } from "./core/reservoir";
import {
  meanGC,
  meanLength,
  meanQuality,
  mergeStats,
  stdDevGC,
  stdDevLength,
  stdDevQuality,
} from "./core/running-stats";
import type { ResolvedReducerOptions } from "./options";
import { resolveReducerOptions } from "./options";

/**
 * Reporting view of a result, with every derived figure computed
 */
export interface QcSummary {
  readonly sourceIdentifier: string;
  readonly chunkCount: number;
  readonly readCount: number;
  readonly discarded: number;
  /** Discarded records over all candidate records, in [0, 1] */
  readonly discardRate: number | null;
  /** Validated reads passing the length and N filter */
  readonly passingFilter: number;
  /** Validated reads failing the length and N filter */
  readonly filteredOut: number;
  readonly length: SummaryFigures;
  readonly gc: Omit<SummaryFigures, "min" | "max">;
  readonly quality: SummaryFigures;
  /** Percentage of bases with Phred score of at least 20 */
  readonly q20Percent: number | null;
  /** Percentage of bases with Phred score of at least 30 */
  readonly q30Percent: number | null;
  /** Percentage of bases called N */
  readonly nPercent: number | null;
  /** Mean quality at each profiled position */
  readonly positionMeanQuality: readonly number[];
}

/**
 * Mean, spread and range of one measure
 */
export interface SummaryFigures {
  readonly mean: number | null;
  readonly stdDev: number | null;
  readonly min: number | null;
  readonly max: number | null;
}

/**
 * Merge results into one combined result
 *
 * @param results - Chunk or combined results, in any order
 * @param options - Combined sample cap and label
 * @throws {EmptyInputError} If `results` is empty
 * @throws {ValidationError} If options are out of range
 *
 * @example
 * ```typescript
 * const combined = mergeResults([chunkA, chunkB], { label: "sample-1" });
 * console.log(combined.stats.count === chunkA.stats.count + chunkB.stats.count); // true
 * ```
 */
export function mergeResults(results: Iterable<QcResult>, options: ReducerOptions = {}): CombinedResult {
  return mergeResolved(Array.from(results), resolveReducerOptions(options));
}

/**
 * Reducer bound to fixed options
 */
export class Reducer {
  private readonly options: ResolvedReducerOptions;

  /**
   * @throws {ValidationError} If options are out of range
   */
  constructor(options: ReducerOptions = {}) {
    this.options = resolveReducerOptions(options);
  }

  /**
   * @throws {EmptyInputError} If `results` is empty
   */
  merge(results: Iterable<QcResult>): CombinedResult {
    return mergeResolved(Array.from(results), this.options);
  }
}

/**
 * Per-chunk figures of a chunk result
 */
export function summarizeChunk(result: ChunkResult): ChunkSummary {
  return {
    sourceIdentifier: result.sourceIdentifier,
    count: result.stats.count,
    discarded: result.discards.total,
    meanLength: meanLength(result.stats),
    meanGC: meanGC(result.stats),
    meanQuality: meanQuality(result.stats),
  };
}

/**
 * Derive the reporting figures of a chunk or combined result
 */
export function summarize(result: QcResult): QcSummary {
  const { stats, composition, qualityHistogram, discards } = result;
  const bases = stats.sumLength;
  const candidates = stats.count + discards.total;

  return {
    sourceIdentifier: result.sourceIdentifier,
    chunkCount: result.kind === "chunk" ? 1 : result.chunkCount,
    readCount: stats.count,
    discarded: discards.total,
    discardRate: candidates > 0 ? discards.total / candidates : null,
    passingFilter: result.passingFilter,
    filteredOut: stats.count - result.passingFilter,
    length: {
      mean: meanLength(stats),
      stdDev: stdDevLength(stats),
      min: stats.minLength,
      max: stats.maxLength,
    },
    gc: {
      mean: meanGC(stats),
      stdDev: stdDevGC(stats),
    },
    quality: {
      mean: meanQuality(stats),
      stdDev: stdDevQuality(stats),
      min: stats.minQuality,
      max: stats.maxQuality,
    },
    q20Percent: percentAtLeast(qualityHistogram, QUALITY_THRESHOLDS.GOOD, bases),
    q30Percent: percentAtLeast(qualityHistogram, QUALITY_THRESHOLDS.EXCELLENT, bases),
    nPercent: bases > 0 ? (composition.N / bases) * 100 : null,
    positionMeanQuality: positionMeans(result.positionProfile),
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function mergeResolved(results: readonly QcResult[], options: ResolvedReducerOptions): CombinedResult {
  const ordered = [...results].sort((a, b) => compareOrderKeys(orderKey(a), orderKey(b)));
  const [first, ...rest] = ordered;
  if (first === undefined) {
    throw new EmptyInputError();
  }

  const body = rest.reduce<ResultBody>(combineBodies, first);
  const chunkSummaries = ordered
    .flatMap((result) => (result.kind === "chunk" ? [summarizeChunk(result)] : result.chunkSummaries))
    .sort((a, b) => compareIds(a.sourceIdentifier, b.sourceIdentifier));

  const combined: CombinedResult = {
    kind: "combined",
    sourceIdentifier: options.label,
    stats: body.stats,
    positionProfile: body.positionProfile,
    reservoir: mergeReservoirs(
      ordered.map((result) => result.reservoir),
      options.combinedSampleCap
    ),
    composition: body.composition,
    qualityHistogram: body.qualityHistogram,
    gcHistogram: body.gcHistogram,
    discards: body.discards,
    passingFilter: body.passingFilter,
    chunkCount: ordered.reduce((sum, result) => sum + (result.kind === "chunk" ? 1 : result.chunkCount), 0),
    chunkSummaries,
  };
  return deepFreeze(combined);
}

/**
 * Merge the exact fields of two results; the reservoir of `a` is kept as is
 */
function combineBodies(a: ResultBody, b: ResultBody): ResultBody {
  return {
    sourceIdentifier: a.sourceIdentifier,
    stats: mergeStats(a.stats, b.stats),
    positionProfile: mergeProfiles(a.positionProfile, b.positionProfile),
    reservoir: a.reservoir,
    composition: addBaseCounts(a.composition, b.composition),
    qualityHistogram: addHistograms(a.qualityHistogram, b.qualityHistogram),
    gcHistogram: addHistograms(a.gcHistogram, b.gcHistogram),
    discards: addDiscards(a.discards, b.discards),
    passingFilter: a.passingFilter + b.passingFilter,
  };
}

function addHistograms(a: readonly number[], b: readonly number[]): number[] {
  const length = Math.max(a.length, b.length);
  const sum: number[] = [];
  for (let i = 0; i < length; i++) {
    sum.push((a[i] ?? 0) + (b[i] ?? 0));
  }
  return sum;
}

function addDiscards(a: DiscardCounts, b: DiscardCounts): DiscardCounts {
  return {
    total: a.total + b.total,
    byReason: {
      InvalidHeader: a.byReason.InvalidHeader + b.byReason.InvalidHeader,
      InvalidSeparator: a.byReason.InvalidSeparator + b.byReason.InvalidSeparator,
      InvalidBases: a.byReason.InvalidBases + b.byReason.InvalidBases,
      LengthMismatch: a.byReason.LengthMismatch + b.byReason.LengthMismatch,
      DecodeError: a.byReason.DecodeError + b.byReason.DecodeError,
    },
    trailingLines: a.trailingLines + b.trailingLines,
  };
}

function percentAtLeast(histogram: readonly number[], threshold: number, total: number): number | null {
  if (total <= 0) return null;
  let atLeast = 0;
  for (let score = threshold; score < histogram.length; score++) {
    atLeast += histogram[score] ?? 0;
  }
  return (atLeast / total) * 100;
}

/**
 * Identifier followed by the covered chunk identifiers
 */
function orderKey(result: QcResult): readonly string[] {
  return result.kind === "chunk"
    ? [result.sourceIdentifier, result.sourceIdentifier]
    : [result.sourceIdentifier, ...result.chunkSummaries.map((summary) => summary.sourceIdentifier)];
}

function compareOrderKeys(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareIds(a[i] ?? "", b[i] ?? "");
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

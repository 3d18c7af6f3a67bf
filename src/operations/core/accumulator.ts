/**
 * Bounded-memory accumulator for one chunk of reads
 *
 * Folds validated observations into running statistics, a per-position
 * profile, stride samples, composition, histograms and a read-filter count. Memory is O(K) for
 * the profile plus the sample caps; it does not grow with the number of
 * reads. One accumulator belongs to one chunk and is never shared.
 */

import { GC_HISTOGRAM_BINS, QUALITY_HISTOGRAM_BINS } from "../../formats/fastq/constants";
import { gcPercent } from "../../formats/fastq/primitives";
import { decodeQuality } from "../../formats/fastq/quality";
import type {
  BaseCounts,
  ChunkResult,
  FastqRecord,
  RejectionReason,
  ValidatedObservation,
} from "../../types";
import type { ResolvedQcOptions } from "../options";
import { DEFAULT_QC_OPTIONS } from "../options";
import { deepFreeze } from "./freeze";
import { PositionProfileTable } from "./position-profile";
import { StrideSampler } from "./reservoir";

/**
 * Build the numeric view of a validated record
 *
 * GC is computed here, once per record.
 *
 * @throws {DecodeError} If the quality string holds a character outside Phred+33
 */
export function observe(record: FastqRecord): ValidatedObservation {
  return {
    length: record.sequence.length,
    gcPercent: gcPercent(record.sequence),
    qualityScores: decodeQuality(record.quality),
    bases: record.sequence.toUpperCase(),
  };
}

/**
 * GC histogram bin of a percentage; 100% shares the last bin
 */
export function gcBin(gc: number): number {
  return Math.min(GC_HISTOGRAM_BINS - 1, Math.floor(gc));
}

/**
 * Running accumulator for a single chunk
 *
 * @example
 * ```typescript
 * const accumulator = new QcAccumulator();
 * accumulator.fold(observe({ header: "@r1", sequence: "ACGT", separator: "+", quality: "IIII" }));
 * const result = accumulator.snapshot("chunk-0");
 * console.log(result.stats.count); // 1
 * ```
 */
export class QcAccumulator {
  private readonly filterMinLength: number;
  private readonly filterMaxNPercent: number;
  private readonly profile: PositionProfileTable;
  private readonly sampler: StrideSampler;
  private readonly qualityHistogram = new Float64Array(QUALITY_HISTOGRAM_BINS);
  private readonly gcHistogram = new Float64Array(GC_HISTOGRAM_BINS);
  private readonly composition = { A: 0, C: 0, G: 0, T: 0, N: 0 };
  private readonly discardsByReason: Record<RejectionReason, number> = {
    InvalidHeader: 0,
    InvalidSeparator: 0,
    InvalidBases: 0,
    LengthMismatch: 0,
    DecodeError: 0,
  };
  private trailingLines = 0;
  private passingFilter = 0;

  private readCount = 0;
  private sumLength = 0;
  private sumSquaresLength = 0;
  private minLength: number | null = null;
  private maxLength: number | null = null;
  private sumGC = 0;
  private sumSquaresGC = 0;
  private sumQuality = 0;
  private sumSquaresQuality = 0;
  private minQuality: number | null = null;
  private maxQuality: number | null = null;

  constructor(options: ResolvedQcOptions = DEFAULT_QC_OPTIONS) {
    this.filterMinLength = options.filterMinLength;
    this.filterMaxNPercent = options.filterMaxNPercent;
    this.profile = new PositionProfileTable(options.positionLimit);
    this.sampler = new StrideSampler({
      stride: options.sampleStride,
      gcCap: options.gcSampleCap,
      qualityCap: options.qualitySampleCap,
      qualityPositions: options.qualitySamplePositions,
    });
  }

  /**
   * Validated records folded so far
   */
  get count(): number {
    return this.readCount;
  }

  /**
   * Fold one validated observation
   *
   * @performance O(length) for the quality sums, O(min(length, K)) for the profile
   */
  fold(observation: ValidatedObservation): void {
    const { length, gcPercent: gc, qualityScores, bases } = observation;

    this.sumLength += length;
    this.sumSquaresLength += length * length;
    this.minLength = this.minLength === null ? length : Math.min(this.minLength, length);
    this.maxLength = this.maxLength === null ? length : Math.max(this.maxLength, length);

    this.sumGC += gc;
    this.sumSquaresGC += gc * gc;
    const bin = gcBin(gc);
    this.gcHistogram[bin] = (this.gcHistogram[bin] ?? 0) + 1;

    for (const score of qualityScores) {
      this.sumQuality += score;
      this.sumSquaresQuality += score * score;
      if (this.minQuality === null || score < this.minQuality) this.minQuality = score;
      if (this.maxQuality === null || score > this.maxQuality) this.maxQuality = score;
      this.qualityHistogram[score] = (this.qualityHistogram[score] ?? 0) + 1;
    }

    const nCount = this.countBases(bases);
    const nPercent = length > 0 ? (nCount / length) * 100 : 0;
    if (length >= this.filterMinLength && nPercent < this.filterMaxNPercent) {
      this.passingFilter++;
    }

    this.profile.fold(bases, qualityScores);
    this.sampler.offer(this.readCount, gc, qualityScores);
    this.readCount++;
  }

  /**
   * Count one rejected record
   */
  recordDiscard(reason: RejectionReason): void {
    this.discardsByReason[reason]++;
  }

  /**
   * Note lines left over after the last complete record
   */
  recordTrailingLines(count: number): void {
    this.trailingLines += count;
  }

  /**
   * Freeze the current state into a chunk result
   *
   * The accumulator keeps its state and can continue folding.
   */
  snapshot(sourceIdentifier: string): ChunkResult {
    const byReason = { ...this.discardsByReason };
    const total = Object.values(byReason).reduce((sum, n) => sum + n, 0);
    const composition: BaseCounts = { ...this.composition };

    const result: ChunkResult = {
      kind: "chunk",
      sourceIdentifier,
      stats: {
        count: this.readCount,
        sumLength: this.sumLength,
        sumSquaresLength: this.sumSquaresLength,
        minLength: this.minLength,
        maxLength: this.maxLength,
        sumGC: this.sumGC,
        sumSquaresGC: this.sumSquaresGC,
        sumQuality: this.sumQuality,
        sumSquaresQuality: this.sumSquaresQuality,
        minQuality: this.minQuality,
        maxQuality: this.maxQuality,
      },
      positionProfile: this.profile.snapshot(),
      reservoir: this.sampler.snapshot(),
      composition,
      qualityHistogram: Array.from(this.qualityHistogram),
      gcHistogram: Array.from(this.gcHistogram),
      discards: { total, byReason, trailingLines: this.trailingLines },
      passingFilter: this.passingFilter,
    };
    return deepFreeze(result);
  }

  /**
   * Add a read's bases to the composition; returns its N count
   */
  private countBases(bases: string): number {
    let nCount = 0;
    for (let i = 0; i < bases.length; i++) {
      switch (bases.charCodeAt(i)) {
        case 65:
          this.composition.A++;
          break;
        case 67:
          this.composition.C++;
          break;
        case 71:
          this.composition.G++;
          break;
        case 84:
          this.composition.T++;
          break;
        default:
          this.composition.N++;
          nCount++;
      }
    }
    return nCount;
  }
}

/**
 * Core type definitions for streaming read quality control
 *
 * Records and observations are ephemeral; everything from `RunningStats`
 * downward is part of the serializable result shape that chunk processing
 * produces and reduction consumes.
 */

import { type } from "arktype";

// =============================================================================
// RECORDS
// =============================================================================

/**
 * Nucleotides accepted in a read sequence (case-insensitive)
 */
export const NUCLEOTIDES = ["A", "C", "G", "T", "N"] as const;
export type Nucleotide = (typeof NUCLEOTIDES)[number];

/**
 * Count per nucleotide
 */
export type BaseCounts = { readonly [B in Nucleotide]: number };

/**
 * Four consecutive lines grouped by position modulo 4, before validation
 */
export type RawRecord = readonly [string, string, string, string];

/**
 * A structurally valid FASTQ record
 *
 * Invariant: `sequence.length === quality.length`
 */
export interface FastqRecord {
  readonly header: string;
  readonly separator: string;
  readonly sequence: string;
  readonly quality: string;
}

/**
 * Why a candidate record was excluded from statistics
 */
export const REJECTION_REASONS = [
  "InvalidHeader",
  "InvalidSeparator",
  "InvalidBases",
  "LengthMismatch",
  "DecodeError",
] as const;
export type RejectionReason = (typeof REJECTION_REASONS)[number];

/**
 * Outcome of validating one raw record
 */
export type ValidationOutcome =
  | { readonly ok: true; readonly record: FastqRecord }
  | { readonly ok: false; readonly reason: RejectionReason };

/**
 * Numeric view of one validated record, folded once and then dropped
 */
export interface ValidatedObservation {
  readonly length: number;
  /** GC percentage in [0, 100]; 0 for an empty read */
  readonly gcPercent: number;
  /** One Phred score per base, each in [0, 93] */
  readonly qualityScores: readonly number[];
  /** Upper-cased bases, used for per-position composition */
  readonly bases: string;
}

// =============================================================================
// RESULT SHAPE
// =============================================================================

/**
 * Running sums and extrema over validated records.
 *
 * Min/max are `null` until something has been observed; means are derived
 * from the sums at read time. The divisor for quality is the base count,
 * which equals `sumLength`.
 */
export interface RunningStats {
  readonly count: number;
  readonly sumLength: number;
  readonly sumSquaresLength: number;
  readonly minLength: number | null;
  readonly maxLength: number | null;
  readonly sumGC: number;
  readonly sumSquaresGC: number;
  readonly sumQuality: number;
  readonly sumSquaresQuality: number;
  readonly minQuality: number | null;
  readonly maxQuality: number | null;
}

/**
 * Quality statistics and base composition at one read position
 */
export interface PositionStats {
  readonly count: number;
  readonly sumQuality: number;
  readonly sumSquaresQuality: number;
  readonly minQuality: number;
  readonly maxQuality: number;
  readonly bases: BaseCounts;
}

/**
 * Per-position profile for positions `0..limit-1`
 *
 * `positions` holds one entry per position covered by at least one read.
 */
export interface PositionProfile {
  readonly limit: number;
  readonly positions: readonly PositionStats[];
}

/**
 * Stride-sampled GC percentages and quality scores.
 *
 * Deterministic: every `stride`-th validated record is sampled until a
 * buffer reaches its cap. This approximates the distributions; it is not
 * an unbiased random sample.
 */
export interface SampleReservoir {
  readonly stride: number;
  readonly gcCap: number;
  readonly qualityCap: number;
  readonly gc: readonly number[];
  readonly quality: readonly number[];
}

/**
 * Records excluded from statistics, by reason
 */
export interface DiscardCounts {
  readonly total: number;
  readonly byReason: { readonly [R in RejectionReason]: number };
  /** Lines left over after the last complete group of four */
  readonly trailingLines: number;
}

/**
 * Fields shared by chunk-level and combined results
 */
export interface ResultBody {
  readonly sourceIdentifier: string;
  readonly stats: RunningStats;
  readonly positionProfile: PositionProfile;
  readonly reservoir: SampleReservoir;
  readonly composition: BaseCounts;
  /** Base count per Phred score, index = score (0..93) */
  readonly qualityHistogram: readonly number[];
  /** Read count per integer GC percentage, index = floor(gc) (0..100) */
  readonly gcHistogram: readonly number[];
  readonly discards: DiscardCounts;
  /** Validated reads at least `filterMinLength` long with an N percentage below `filterMaxNPercent` */
  readonly passingFilter: number;
}

/**
 * Statistics for one fully processed chunk
 */
export interface ChunkResult extends ResultBody {
  readonly kind: "chunk";
}

/**
 * Per-chunk figures kept for trend reporting
 */
export interface ChunkSummary {
  readonly sourceIdentifier: string;
  readonly count: number;
  readonly discarded: number;
  readonly meanLength: number | null;
  readonly meanGC: number | null;
  readonly meanQuality: number | null;
}

/**
 * Merge of one or more chunk (or combined) results
 */
export interface CombinedResult extends ResultBody {
  readonly kind: "combined";
  readonly chunkCount: number;
  readonly chunkSummaries: readonly ChunkSummary[];
}

/**
 * Anything the reducer accepts
 */
export type QcResult = ChunkResult | CombinedResult;

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Separator line policy: bare `+` only, or also `+` followed by the read id
 */
export type SeparatorMode = "strict" | "relaxed";

/**
 * Chunk processing configuration
 */
export interface QcOptions {
  /** Number of leading read positions profiled (default: 100) */
  readonly positionLimit?: number;
  /** Sample every Nth validated record (default: 100) */
  readonly sampleStride?: number;
  /** Maximum GC samples kept per chunk (default: 1000) */
  readonly gcSampleCap?: number;
  /** Maximum quality samples kept per chunk (default: 1000) */
  readonly qualitySampleCap?: number;
  /** Leading scores taken from each sampled record (default: 10) */
  readonly qualitySamplePositions?: number;
  /** Separator line policy (default: "strict") */
  readonly separatorMode?: SeparatorMode;
  /** Read filter: minimum read length (default: 50) */
  readonly filterMinLength?: number;
  /** Read filter: N percentage a read must stay below (default: 10) */
  readonly filterMaxNPercent?: number;
}

/**
 * Reduction configuration
 */
export interface ReducerOptions {
  /** Cap applied to each merged sample buffer (default: 10000) */
  readonly combinedSampleCap?: number;
  /** Source identifier of the combined result (default: "combined") */
  readonly label?: string;
}

/**
 * Log levels understood by the chunk pool
 */
export type PoolLogLevel = "All" | "Debug" | "Info" | "Warning" | "Error" | "None";

/**
 * Worker pool configuration
 */
export interface PoolOptions extends QcOptions, ReducerOptions {
  /** Chunks processed at the same time (default: 4) */
  readonly concurrency?: number;
  /** Failed chunks tolerated before outstanding work is cancelled (default: unlimited) */
  readonly maxFailures?: number;
  /** Minimum level of pool log output (default: "None") */
  readonly logLevel?: PoolLogLevel;
}

/**
 * First of `keys` holding a number that is not an integer, if any
 */
const firstNonInteger = (
  values: Record<string, unknown>,
  keys: readonly string[],
  allowInfinite: readonly string[] = []
): string | undefined => {
  for (const key of keys) {
    const value = values[key];
    if (typeof value !== "number" || Number.isInteger(value)) continue;
    if (value === Number.POSITIVE_INFINITY && allowInfinite.includes(key)) continue;
    return key;
  }
  return undefined;
};

/**
 * ArkType schema for chunk processing options
 */
export const QcOptionsSchema = type({
  "positionLimit?": "number>=1",
  "sampleStride?": "number>=1",
  "gcSampleCap?": "number>=0",
  "qualitySampleCap?": "number>=0",
  "qualitySamplePositions?": "number>=0",
  "separatorMode?": '"strict"|"relaxed"',
  "filterMinLength?": "number>=0",
  "filterMaxNPercent?": "number>=0",
}).narrow((options, ctx) => {
  const key = firstNonInteger(options, [
    "positionLimit",
    "sampleStride",
    "gcSampleCap",
    "qualitySampleCap",
    "qualitySamplePositions",
    "filterMinLength",
  ]);
  return key === undefined ? true : ctx.reject({ expected: "an integer", path: [key] });
});

/**
 * ArkType schema for reduction options
 */
export const ReducerOptionsSchema = type({
  "combinedSampleCap?": "number>=0",
  "label?": "string>0",
}).narrow((options, ctx) => {
  const key = firstNonInteger(options, ["combinedSampleCap"]);
  return key === undefined ? true : ctx.reject({ expected: "an integer", path: [key] });
});

/**
 * ArkType schema for the pool-only options
 */
export const PoolSettingsSchema = type({
  "concurrency?": "number>=1",
  "maxFailures?": "number>=0",
  "logLevel?": '"All"|"Debug"|"Info"|"Warning"|"Error"|"None"',
}).narrow((options, ctx) => {
  const key = firstNonInteger(options, ["concurrency", "maxFailures"], ["maxFailures"]);
  return key === undefined ? true : ctx.reject({ expected: "an integer", path: [key] });
});

// =============================================================================
// FILES
// =============================================================================

/**
 * Validated file path
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * ArkType schema for file paths
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

/**
 * Compression formats understood by the file reader
 */
export type CompressionFormat = "gzip" | "none";

/**
 * File reading configuration
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Decompress gzip files detected by extension (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression detection */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * ArkType schema for file reader options
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

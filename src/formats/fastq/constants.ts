/**
 * Constants for FASTQ parsing and quality score decoding
 *
 * Central location for the magic numbers used by the record validator,
 * the quality decoder and the accumulator.
 */

// ============================================================================
// QUALITY SCORE THRESHOLDS
// ============================================================================

/**
 * Quality score thresholds for assessment
 * Based on standard Phred score interpretations in bioinformatics
 */
export const QUALITY_THRESHOLDS = {
  /** Q30: Excellent quality, 1 in 1000 error rate */
  EXCELLENT: 30,
  /** Q20: Good quality, 1 in 100 error rate */
  GOOD: 20,
} as const;

// ============================================================================
// ASCII VALUE BOUNDARIES
// ============================================================================

/**
 * ASCII character code boundaries for Phred+33 ("Sanger") encoding
 */
export const PHRED33 = {
  /** Offset subtracted from the character code */
  OFFSET: 33,
  /** Lowest valid character code (!) */
  MIN_CHAR_CODE: 33,
  /** Highest valid character code (~) */
  MAX_CHAR_CODE: 126,
  /** Highest representable score */
  MAX_SCORE: 93,
} as const;

// ============================================================================
// RECORD STRUCTURE
// ============================================================================

/**
 * Line markers of the 4-line FASTQ layout
 */
export const RECORD_MARKERS = {
  HEADER: "@",
  SEPARATOR: "+",
  LINES_PER_RECORD: 4,
} as const;

// ============================================================================
// ACCUMULATION DEFAULTS
// ============================================================================

/**
 * Default chunk processing configuration
 */
export const QC_DEFAULTS = {
  /** Leading positions kept in the per-position profile */
  POSITION_LIMIT: 100,
  /** Sample every Nth validated record */
  SAMPLE_STRIDE: 100,
  /** Per-chunk cap on sampled GC percentages */
  GC_SAMPLE_CAP: 1000,
  /** Per-chunk cap on sampled quality scores */
  QUALITY_SAMPLE_CAP: 1000,
  /** Leading scores taken from each sampled record */
  QUALITY_SAMPLE_POSITIONS: 10,
  /** Shortest read that passes the read filter */
  FILTER_MIN_LENGTH: 50,
  /** N percentage a read must stay below to pass the read filter */
  FILTER_MAX_N_PERCENT: 10,
  /** Separator line policy */
  SEPARATOR_MODE: "strict" as const,
  /** Cap applied to each merged sample buffer */
  COMBINED_SAMPLE_CAP: 10_000,
  /** Source identifier of a combined result */
  COMBINED_LABEL: "combined",
} as const;

/**
 * Bins of the Phred score histogram (scores 0..93)
 */
export const QUALITY_HISTOGRAM_BINS = PHRED33.MAX_SCORE + 1;

/**
 * Bins of the GC percentage histogram (0..100)
 */
export const GC_HISTOGRAM_BINS = 101;

/**
 * FASTQ Format Module
 *
 * Record grouping, structural validation and Phred+33 decoding for
 * 4-line FASTQ. These are the leaf stages the chunk processor drives.
 *
 * @module fastq
 *
 * @example Group, validate and decode
 * ```typescript
 * import { decodeQuality, groupRecords, validateRecord } from 'readqc';
 *
 * for await (const raw of groupRecords(lines)) {
 *   const outcome = validateRecord(raw);
 *   if (outcome.ok) {
 *     const scores = decodeQuality(outcome.record.quality);
 *   }
 * }
 * ```
 */

export { PHRED33, QC_DEFAULTS, QUALITY_THRESHOLDS, RECORD_MARKERS } from "./constants";
export { groupRecords, splitLines } from "./parser";
export {
  extractId,
  gcPercent,
  hasOnlyValidBases,
  isBareSeparator,
  isHeaderRepeatSeparator,
  isValidHeader,
  lengthsMatch,
} from "./primitives";
export type { QualityScore } from "./quality";
export {
  charToScore,
  decodeQuality,
  encodeScores,
  isValidQualityScore,
  scoreToChar,
} from "./quality";
export type { LineSource, RecordParserOptions, RecordValidatorOptions } from "./types";
export { createRecordValidator, validateRecord } from "./validation";

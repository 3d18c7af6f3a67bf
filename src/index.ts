/**
 * readqc - streaming quality control for FASTQ reads
 *
 * Parses 4-line FASTQ records, folds them into bounded-memory running
 * statistics per chunk, and merges chunk results into one combined result
 * whose counts, extrema and means do not depend on how the input was split.
 */

// Error types
export {
  BufferError,
  ChunkCancelledError,
  ChunkIOError,
  DecodeError,
  EmptyInputError,
  FileError,
  ReadQcError,
  StreamError,
  ValidationError,
} from "./errors";
// FASTQ records
export {
  charToScore,
  createRecordValidator,
  decodeQuality,
  encodeScores,
  extractId,
  gcPercent,
  groupRecords,
  hasOnlyValidBases,
  isValidQualityScore,
  PHRED33,
  QC_DEFAULTS,
  QUALITY_THRESHOLDS,
  scoreToChar,
  splitLines,
  validateRecord,
} from "./formats/fastq";
export type {
  LineSource,
  QualityScore,
  RecordParserOptions,
  RecordValidatorOptions,
} from "./formats/fastq";
// File I/O
export { createStream, detectCompression, exists, getSize, readFileLines } from "./io/file-reader";
export { processBuffer, readLines } from "./io/stream-utils";
// Chunk processing and reduction
export { ChunkProcessor } from "./operations/chunk-processor";
export type { ProcessChunkOptions, ProcessFileOptions } from "./operations/chunk-processor";
export { gcBin, observe, QcAccumulator } from "./operations/core/accumulator";
export { mergeProfiles, positionMeans } from "./operations/core/position-profile";
export { mergeReservoirs, StrideSampler, thinEvenly } from "./operations/core/reservoir";
export {
  EMPTY_STATS,
  meanGC,
  meanLength,
  meanQuality,
  mergeStats,
  stdDevGC,
  stdDevLength,
  stdDevQuality,
} from "./operations/core/running-stats";
export {
  DEFAULT_POOL_SETTINGS,
  DEFAULT_QC_OPTIONS,
  DEFAULT_REDUCER_OPTIONS,
  resolvePoolSettings,
  resolveQcOptions,
  resolveReducerOptions,
} from "./operations/options";
export { fileSources, runChunks } from "./operations/pool";
export type { ChunkFailure, ChunkSource, PoolRunResult } from "./operations/pool";
export { mergeResults, Reducer, summarize, summarizeChunk } from "./operations/reducer";
export type { QcSummary, SummaryFigures } from "./operations/reducer";
export { parseResult, QcResultSchema, toJSON } from "./operations/serialization";
// Core types
export type {
  BaseCounts,
  ChunkResult,
  ChunkSummary,
  CombinedResult,
  CompressionFormat,
  DiscardCounts,
  FastqRecord,
  FileReaderOptions,
  Nucleotide,
  PoolLogLevel,
  PoolOptions,
  PositionProfile,
  PositionStats,
  QcOptions,
  QcResult,
  RawRecord,
  ReducerOptions,
  RejectionReason,
  ResultBody,
  RunningStats,
  SampleReservoir,
  SeparatorMode,
  ValidatedObservation,
  ValidationOutcome,
} from "./types";
export { NUCLEOTIDES, REJECTION_REASONS } from "./types";

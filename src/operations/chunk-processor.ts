/**
 * Chunk processing: lines in, one immutable ChunkResult out
 *
 * Drives record grouping, validation, quality decoding and accumulation for
 * a single chunk. Per-record problems are counted as discards. A failure of
 * the line source fails the whole chunk: partial statistics are dropped so
 * a chunk either contributes completely or not at all.
 *
 * @module operations/chunk-processor
 */

import { ChunkCancelledError, ChunkIOError, DecodeError } from "../errors";
import { groupRecords, splitLines } from "../formats/fastq/parser";
import type { LineSource } from "../formats/fastq/types";
import { createRecordValidator } from "../formats/fastq/validation";
import { readFileLines } from "../io/file-reader";
import type { ChunkResult, FastqRecord, FileReaderOptions, QcOptions, ValidatedObservation } from "../types";
import { observe, QcAccumulator } from "./core/accumulator";
import type { ResolvedQcOptions } from "./options";
import { resolveQcOptions } from "./options";

/**
 * Per-call settings of `ChunkProcessor.process`
 */
export interface ProcessChunkOptions {
  /** Label carried into the result and any error */
  readonly sourceIdentifier: string;
  /** Abandon the chunk when aborted */
  readonly signal?: AbortSignal;
}

/**
 * Per-call settings of `ChunkProcessor.processFile`
 */
export interface ProcessFileOptions extends FileReaderOptions {
  /** Label for the result (default: the file path) */
  readonly sourceIdentifier?: string;
  readonly signal?: AbortSignal;
}

/**
 * Turns a chunk's line stream into a ChunkResult
 *
 * A processor holds only its resolved options, so one instance may process
 * many chunks, one after another or concurrently.
 *
 * @example
 * ```typescript
 * const processor = new ChunkProcessor({ positionLimit: 150 });
 * const result = await processor.processFile('/data/chunk_000.fastq.gz');
 * console.log(`${result.stats.count} reads, ${result.discards.total} discarded`);
 * ```
 */
export class ChunkProcessor {
  private readonly options: ResolvedQcOptions;

  /**
   * @throws {ValidationError} If any option is out of range
   */
  constructor(options: QcOptions = {}) {
    this.options = resolveQcOptions(options);
  }

  /**
   * Process one chunk's lines
   *
   * @throws {ChunkIOError} If the line source fails; no partial result is kept
   * @throws {ChunkCancelledError} If `signal` is aborted before the chunk completes
   */
  async process(lines: LineSource, options: ProcessChunkOptions): Promise<ChunkResult> {
    const { sourceIdentifier, signal } = options;
    if (signal?.aborted === true) {
      throw new ChunkCancelledError(sourceIdentifier);
    }

    const accumulator = new QcAccumulator(this.options);
    const validate = createRecordValidator({ separatorMode: this.options.separatorMode });
    let recordsRead = 0;

    const records = groupRecords(lines, {
      onTrailingLines: (count) => accumulator.recordTrailingLines(count),
      ...(signal !== undefined ? { signal } : {}),
    });

    try {
      for await (const raw of records) {
        recordsRead++;
        const outcome = validate(raw);
        if (!outcome.ok) {
          accumulator.recordDiscard(outcome.reason);
          continue;
        }

        const observation = tryObserve(outcome.record);
        if (observation === undefined) {
          accumulator.recordDiscard("DecodeError");
          continue;
        }
        accumulator.fold(observation);
      }
    } catch (error) {
      if (signal?.aborted === true) {
        throw new ChunkCancelledError(sourceIdentifier);
      }
      throw ChunkIOError.fromSystemError(sourceIdentifier, recordsRead, error);
    }

    if (signal?.aborted === true) {
      throw new ChunkCancelledError(sourceIdentifier);
    }
    return accumulator.snapshot(sourceIdentifier);
  }

  /**
   * Process an in-memory chunk of FASTQ text
   */
  async processText(text: string, sourceIdentifier: string, signal?: AbortSignal): Promise<ChunkResult> {
    return this.process(splitLines(text), {
      sourceIdentifier,
      ...(signal !== undefined ? { signal } : {}),
    });
  }

  /**
   * Process a chunk file, decompressing `.gz` input
   *
   * A missing or unreadable file fails the chunk with a ChunkIOError whose
   * `systemError` is the underlying FileError.
   */
  async processFile(path: string, options: ProcessFileOptions = {}): Promise<ChunkResult> {
    const { sourceIdentifier = path, signal, ...readerOptions } = options;
    return this.process(readFileLines(path, readerOptions), {
      sourceIdentifier,
      ...(signal !== undefined ? { signal } : {}),
    });
  }
}

/**
 * Decode a validated record, or undefined if its quality string is not Phred+33
 */
function tryObserve(record: FastqRecord): ValidatedObservation | undefined {
  try {
    return observe(record);
  } catch (error) {
    if (error instanceof DecodeError) return undefined;
    throw error;
  }
}

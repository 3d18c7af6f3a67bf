/**
 * Bounded-concurrency chunk pool
 *
 * Runs one ChunkProcessor per chunk on Effect fibers, at most
 * `concurrency` at a time. Each chunk is isolated: its accumulator is
 * created, filled and frozen inside its own fiber. Completed results are
 * pushed to a queue, which is the only state the fibers share, and are
 * reduced once every chunk has finished or been cancelled.
 *
 * Once more than `maxFailures` chunks have failed, the remaining fibers are
 * interrupted. Interruption aborts the `AbortSignal` handed to the chunk,
 * so in-flight reads stop at the next line. Failed and cancelled chunks
 * contribute nothing to the combined result.
 *
 * Fibers interleave on one event loop: reads overlap, CPU work does not.
 *
 * @module operations/pool
 */

import { Chunk, Data, Effect, Logger, LogLevel, Queue, Ref } from "effect";
import { ChunkIOError, EmptyInputError, ReadQcError } from "../errors";
import type { LineSource } from "../formats/fastq/types";
import { readFileLines } from "../io/file-reader";
import type { ChunkResult, CombinedResult, FileReaderOptions, PoolOptions } from "../types";
import { ChunkProcessor } from "./chunk-processor";
import { resolvePoolSettings } from "./options";
import { Reducer } from "./reducer";

/**
 * One unit of work for the pool
 */
export interface ChunkSource {
  /** Becomes the chunk's `sourceIdentifier` */
  readonly id: string;
  /** Open the chunk's lines; called once, inside the worker */
  readonly open: (signal: AbortSignal) => LineSource | Promise<LineSource>;
}

/**
 * A chunk that failed, with the error that failed it
 */
export interface ChunkFailure {
  readonly sourceIdentifier: string;
  readonly error: ReadQcError;
}

/**
 * Outcome of a pool run
 */
export interface PoolRunResult {
  readonly result: CombinedResult;
  /** Number of chunks folded into `result` */
  readonly completed: number;
  readonly failures: readonly ChunkFailure[];
  /** Identifiers of chunks interrupted or never started */
  readonly cancelled: readonly string[];
}

class FailureLimitExceeded extends Data.TaggedError("FailureLimitExceeded")<{
  readonly failures: number;
  readonly maxFailures: number;
}> {}

/**
 * Chunk sources that read files from disk, `.gz` decompressed on the fly
 *
 * @example
 * ```typescript
 * const { result } = await runChunks(fileSources(['chunk_000.fastq', 'chunk_001.fastq']));
 * ```
 */
export function fileSources(paths: Iterable<string>, options: FileReaderOptions = {}): ChunkSource[] {
  return Array.from(paths, (path) => ({
    id: path,
    open: () => readFileLines(path, options),
  }));
}

/**
 * Process chunks concurrently and reduce the completed ones
 *
 * @param sources - Chunks to process
 * @param options - Chunk processing, reduction and pool settings
 * @returns The combined result plus completion, failure and cancellation tallies
 * @throws {ValidationError} If any option is out of range
 * @throws {EmptyInputError} If no chunk completed
 *
 * @example
 * ```typescript
 * const run = await runChunks(fileSources(paths), { concurrency: 8, maxFailures: 2, logLevel: "Info" });
 * console.log(`${run.completed} chunks, ${run.result.stats.count} reads`);
 * for (const failure of run.failures) {
 *   console.error(failure.error.toString());
 * }
 * ```
 */
export async function runChunks(
  sources: Iterable<ChunkSource>,
  options: PoolOptions = {}
): Promise<PoolRunResult> {
  const settings = resolvePoolSettings(options);
  const processor = new ChunkProcessor(options);
  const reducer = new Reducer(options);
  const sourceList = Array.from(sources);

  const program = Effect.gen(function* () {
    const completedQueue = yield* Queue.unbounded<ChunkResult>();
    const failuresRef = yield* Ref.make<readonly ChunkFailure[]>([]);

    const recordFailure = (failure: ChunkFailure) =>
      Effect.gen(function* () {
        const failures = yield* Ref.updateAndGet(failuresRef, (list) => [...list, failure]);
        yield* Effect.logWarning(`Chunk failed: ${failure.error.message}`);
        if (failures.length > settings.maxFailures) {
          return yield* Effect.fail(
            new FailureLimitExceeded({ failures: failures.length, maxFailures: settings.maxFailures })
          );
        }
      });

    const runOne = (source: ChunkSource) =>
      Effect.tryPromise({
        try: (signal) => processSource(processor, source, signal),
        catch: (error) => toReadQcError(source.id, error),
      }).pipe(
        Effect.tap((result) => Queue.offer(completedQueue, result)),
        Effect.tap((result) =>
          Effect.logDebug(`Chunk completed: ${result.stats.count} reads, ${result.discards.total} discarded`)
        ),
        Effect.catchAll((error) => recordFailure({ sourceIdentifier: source.id, error })),
        Effect.annotateLogs("chunk", source.id)
      );

    yield* Effect.logInfo(`Processing ${sourceList.length} chunks`).pipe(
      Effect.annotateLogs("concurrency", settings.concurrency)
    );

    yield* Effect.forEach(sourceList, runOne, {
      concurrency: settings.concurrency,
      discard: true,
    }).pipe(
      Effect.catchTag("FailureLimitExceeded", (error) =>
        Effect.logWarning(
          `${error.failures} chunks failed (limit ${error.maxFailures}); cancelling outstanding chunks`
        )
      )
    );

    const completed = Chunk.toReadonlyArray(yield* Queue.takeAll(completedQueue));
    const failures = yield* Ref.get(failuresRef);
    return { completed, failures };
  });

  const { completed, failures } = await Effect.runPromise(
    program.pipe(Logger.withMinimumLogLevel(LogLevel.fromLiteral(settings.logLevel)))
  );

  const finished = new Set<string>([
    ...completed.map((result) => result.sourceIdentifier),
    ...failures.map((failure) => failure.sourceIdentifier),
  ]);
  const cancelled = sourceList.map((source) => source.id).filter((id) => !finished.has(id));

  if (completed.length === 0) {
    throw new EmptyInputError(
      "No chunk completed successfully",
      `${failures.length} failed, ${cancelled.length} cancelled`
    );
  }

  return {
    result: reducer.merge(completed),
    completed: completed.length,
    failures,
    cancelled,
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function processSource(
  processor: ChunkProcessor,
  source: ChunkSource,
  signal: AbortSignal
): Promise<ChunkResult> {
  let lines: LineSource;
  try {
    lines = await source.open(signal);
  } catch (error) {
    throw ChunkIOError.fromSystemError(source.id, 0, error);
  }
  return processor.process(lines, { sourceIdentifier: source.id, signal });
}

function toReadQcError(sourceIdentifier: string, error: unknown): ReadQcError {
  return error instanceof ReadQcError ? error : ChunkIOError.fromSystemError(sourceIdentifier, 0, error);
}

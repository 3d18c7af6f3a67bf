/**
 * File reading for FASTQ chunks
 *
 * Streams files through the Effect platform `FileSystem` service and
 * decompresses gzip input on the fly, detected by file extension.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { DecompressionStream } from "node:stream/web";
import { FileError } from "../errors";
import type { CompressionFormat, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";
import { readLines } from "./stream-utils";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
  compressionFormat: "none",
};

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Guess the compression format of a file from its name
 *
 * @example
 * ```typescript
 * detectCompression('reads.fastq.gz'); // 'gzip'
 * detectCompression('reads.fastq');    // 'none'
 * ```
 */
export function detectCompression(path: string): CompressionFormat {
  const lower = path.toLowerCase();
  return GZIP_EXTENSIONS.some((extension) => lower.endsWith(extension)) ? "gzip" : "none";
}

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If the file cannot be accessed
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Open a file as a byte stream, decompressed when it is gzip
 *
 * @param path - File to read
 * @param options - Buffer size and compression handling
 * @throws {FileError} If the path is invalid or the file cannot be opened
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      "File does not exist or is not a regular file",
      validatedPath,
      "open",
      undefined,
      "Check that the file path is correct"
    );
  }

  const stream = await createBaseStream(validatedPath, mergedOptions);
  if (!mergedOptions.autoDecompress) return stream;

  const compressionFormat =
    mergedOptions.compressionFormat === "none"
      ? detectCompression(validatedPath)
      : mergedOptions.compressionFormat;

  return compressionFormat === "gzip" ? stream.pipeThrough(new DecompressionStream("gzip")) : stream;
}

/**
 * Read a file as text lines
 *
 * @example
 * ```typescript
 * for await (const line of readFileLines('/data/chunk_000.fastq.gz')) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readFileLines(
  path: string,
  options: FileReaderOptions = {}
): AsyncGenerator<string, void, undefined> {
  const stream = await createStream(path, options);
  yield* readLines(stream);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function createBaseStream(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      bufferSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return {
    bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
    autoDecompress: options.autoDecompress ?? DEFAULT_OPTIONS.autoDecompress,
    compressionFormat: options.compressionFormat ?? DEFAULT_OPTIONS.compressionFormat,
  };
}

/**
 * Line splitting for byte streams
 *
 * Turns a `ReadableStream<Uint8Array>` into complete text lines, carrying
 * partial lines across chunk boundaries.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

// Longest accepted line, in characters
const MAX_LINE_LENGTH = 1_000_000;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering so that complete lines are yielded even when
 * chunks don't align with line boundaries. A final line without a newline
 * is yielded unless it is blank. If iteration stops before the end of the
 * stream (an error, or the consumer returning early), the stream is
 * cancelled so the underlying file is closed.
 *
 * @param stream - Stream of binary data to process
 * @yields Complete lines of text, without line terminators
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line exceeds the maximum length
 *
 * @example
 * ```typescript
 * const stream = await createStream('/data/reads.fastq.gz');
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let exhausted = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    yield* result.lines;
    if (result.remainder.trim() !== "") {
      yield result.remainder;
    }
    exhausted = true;
  } catch (error) {
    if (error instanceof BufferError) throw error;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    if (!exhausted) {
      // A failing cancel must not replace the error already propagating
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n` and `\r\n` line endings and keeps an incomplete final line
 * as the remainder for the next call.
 *
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer.charCodeAt(newline - 1) === 13 ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);

    if (line.length > MAX_LINE_LENGTH) {
      throw new BufferError(
        `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
        line.length,
        "overflow",
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }

    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

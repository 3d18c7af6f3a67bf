/**
 * FASTQ record grouping
 *
 * Groups a line stream into raw 4-line records strictly by position modulo
 * four. No content checks happen here: a malformed group is still yielded
 * and left for the validator to reject, so one bad record never shifts the
 * framing of the ones after it. The stream is consumed in a single pass.
 */

import type { RawRecord } from "../../types";
import { RECORD_MARKERS } from "./constants";
import type { LineSource, RecordParserOptions } from "./types";

/**
 * Lazily group lines into raw 4-line records
 *
 * Lines are trimmed of surrounding whitespace (including `\r` from CRLF
 * files). A trailing group of fewer than four lines is not yielded; its
 * size is reported through `onTrailingLines`.
 *
 * @param lines - Text lines of one chunk
 * @param options - Trailing-line callback and abort signal
 * @yields Raw records in input order
 *
 * @example
 * ```typescript
 * for await (const [header, sequence, separator, quality] of groupRecords(lines)) {
 *   console.log(header, sequence.length);
 * }
 * ```
 */
export async function* groupRecords(
  lines: LineSource,
  options: RecordParserOptions = {}
): AsyncGenerator<RawRecord, void, undefined> {
  const pending: string[] = [];

  for await (const line of lines) {
    options.signal?.throwIfAborted();

    pending.push(line.trim());
    if (pending.length === RECORD_MARKERS.LINES_PER_RECORD) {
      const [header = "", sequence = "", separator = "", quality = ""] = pending;
      pending.length = 0;
      yield [header, sequence, separator, quality];
    }
  }

  if (pending.length > 0) {
    options.onTrailingLines?.(pending.length);
  }
}

/**
 * Split an in-memory chunk of text into lines
 *
 * Handles `\n` and `\r\n`; a single trailing newline does not produce an
 * empty final line.
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

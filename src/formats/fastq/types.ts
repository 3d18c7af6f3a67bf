/**
 * Type definitions for FASTQ record grouping and validation
 *
 * Separated from the implementations to keep the parser, validator and
 * decoder free of circular imports.
 */

import type { SeparatorMode } from "../../types";

/**
 * Any source of text lines, synchronous or asynchronous
 */
export type LineSource = Iterable<string> | AsyncIterable<string>;

/**
 * Record grouping options
 */
export interface RecordParserOptions {
  /**
   * Called once at the end of the stream when fewer than four lines are
   * left over; those lines are dropped
   */
  readonly onTrailingLines?: (count: number) => void;
  /** Stop grouping when aborted */
  readonly signal?: AbortSignal;
}

/**
 * Record validation options
 */
export interface RecordValidatorOptions {
  /**
   * - 'strict': separator must be exactly `+` (default)
   * - 'relaxed': `+` followed by the read id is also accepted
   */
  readonly separatorMode?: SeparatorMode;
}

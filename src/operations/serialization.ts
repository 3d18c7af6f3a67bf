/**
 * JSON serialization of chunk and combined results
 *
 * Results are plain data, so the JSON document is the result itself.
 * Parsing validates the document's shape with ArkType before handing it
 * back, so a parsed result can be fed straight into the reducer (for
 * instance to build a file-level result from stored chunk-level ones).
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { QcResult } from "../types";
import { deepFreeze } from "./core/freeze";

const count = "number>=0";
const nullableNumber = "number | null";

const BaseCountsSchema = type({ A: count, C: count, G: count, T: count, N: count });

const RunningStatsSchema = type({
  count,
  sumLength: count,
  sumSquaresLength: count,
  minLength: nullableNumber,
  maxLength: nullableNumber,
  sumGC: count,
  sumSquaresGC: count,
  sumQuality: count,
  sumSquaresQuality: count,
  minQuality: nullableNumber,
  maxQuality: nullableNumber,
});

const PositionStatsSchema = type({
  count: "number>=1",
  sumQuality: count,
  sumSquaresQuality: count,
  minQuality: count,
  maxQuality: count,
  bases: BaseCountsSchema,
});

const ResultBodySchema = type({
  sourceIdentifier: "string",
  stats: RunningStatsSchema,
  positionProfile: {
    limit: "number>=1",
    positions: PositionStatsSchema.array(),
  },
  reservoir: {
    stride: "number>=1",
    gcCap: count,
    qualityCap: count,
    gc: "number[]",
    quality: "number[]",
  },
  composition: BaseCountsSchema,
  qualityHistogram: "number[]",
  gcHistogram: "number[]",
  discards: {
    total: count,
    byReason: {
      InvalidHeader: count,
      InvalidSeparator: count,
      InvalidBases: count,
      LengthMismatch: count,
      DecodeError: count,
    },
    trailingLines: count,
  },
  passingFilter: count,
});

const ChunkSummarySchema = type({
  sourceIdentifier: "string",
  count,
  discarded: count,
  meanLength: nullableNumber,
  meanGC: nullableNumber,
  meanQuality: nullableNumber,
});

const ChunkResultSchema = ResultBodySchema.and({ kind: "'chunk'" });

const CombinedResultSchema = ResultBodySchema.and({
  kind: "'combined'",
  chunkCount: "number>=1",
  chunkSummaries: ChunkSummarySchema.array(),
});

/**
 * ArkType schema for serialized chunk and combined results
 */
export const QcResultSchema = ChunkResultSchema.or(CombinedResultSchema);

/**
 * Serialize a result to a JSON document
 *
 * @param indent - Spaces of indentation; omit for compact output
 */
export function toJSON(result: QcResult, indent?: number): string {
  return JSON.stringify(result, null, indent);
}

/**
 * Parse and validate a serialized result
 *
 * @param json - JSON text, or an already-parsed value
 * @returns A frozen chunk or combined result
 * @throws {ValidationError} If the input is not valid JSON or not a result
 *
 * @example
 * ```typescript
 * const stored = await readFile('chunk_000.qc.json', 'utf8');
 * const combined = mergeResults([parseResult(stored), freshChunk]);
 * ```
 */
export function parseResult(json: unknown): QcResult {
  let data: unknown = json;
  if (typeof json === "string") {
    try {
      data = JSON.parse(json);
    } catch (error) {
      throw new ValidationError(
        `Invalid result JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const validationResult = QcResultSchema(data);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid serialized result: ${validationResult.summary}`,
      undefined,
      "Expected a chunk or combined QC result"
    );
  }

  const result: QcResult = validationResult;
  return deepFreeze(result);
}

/**
 * FASTQ record validation
 *
 * Accepts or rejects a raw 4-line group against the structural contract.
 * Rules run in a fixed order and stop at the first failure:
 *
 * 1. header starts with `@`                      → InvalidHeader
 * 2. separator is `+` (or `+<id>` when relaxed)  → InvalidSeparator
 * 3. bases are A/C/G/T/N, any case               → InvalidBases
 * 4. sequence and quality lengths match          → LengthMismatch
 *
 * Validation is pure and never throws; rejections are returned as values
 * so the caller can count them.
 *
 * @module fastq/validation
 */

import type { RawRecord, ValidationOutcome } from "../../types";
import { QC_DEFAULTS } from "./constants";
import {
  hasOnlyValidBases,
  isBareSeparator,
  isHeaderRepeatSeparator,
  isValidHeader,
  lengthsMatch,
} from "./primitives";
import type { RecordValidatorOptions } from "./types";

/**
 * Validate one raw record
 *
 * @param raw - Four lines grouped by the record parser
 * @param options - Separator policy
 * @returns The validated record, or the first rule it breaks
 *
 * @example
 * ```typescript
 * const outcome = validateRecord(["@r1", "ACGT", "+", "IIII"]);
 * if (outcome.ok) {
 *   console.log(outcome.record.sequence);
 * } else {
 *   console.log(`rejected: ${outcome.reason}`);
 * }
 * ```
 */
export function validateRecord(
  raw: RawRecord,
  options: RecordValidatorOptions = {}
): ValidationOutcome {
  const [header, sequence, separator, quality] = raw;
  const separatorMode = options.separatorMode ?? QC_DEFAULTS.SEPARATOR_MODE;

  if (!isValidHeader(header)) {
    return { ok: false, reason: "InvalidHeader" };
  }

  const separatorOk =
    isBareSeparator(separator) ||
    (separatorMode === "relaxed" && isHeaderRepeatSeparator(separator, header));
  if (!separatorOk) {
    return { ok: false, reason: "InvalidSeparator" };
  }

  if (!hasOnlyValidBases(sequence)) {
    return { ok: false, reason: "InvalidBases" };
  }

  if (!lengthsMatch(sequence, quality)) {
    return { ok: false, reason: "LengthMismatch" };
  }

  return { ok: true, record: { header, sequence, separator, quality } };
}

/**
 * Build a validator with fixed options, for use in tight loops
 */
export function createRecordValidator(
  options: RecordValidatorOptions = {}
): (raw: RawRecord) => ValidationOutcome {
  return (raw) => validateRecord(raw, options);
}

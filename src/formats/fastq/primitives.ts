/**
 * FASTQ record primitives - minimal, composable checks
 *
 * Each function does one thing and has no dependencies on other modules
 * beyond the constants table. The validator composes them in rule order.
 */

import { RECORD_MARKERS } from "./constants";

// ============================================================================
// VALIDATION PRIMITIVES
// ============================================================================

/**
 * Check if a line is a FASTQ header
 *
 * @performance O(1)
 */
export function isValidHeader(line: string): boolean {
  return line.startsWith(RECORD_MARKERS.HEADER);
}

/**
 * Check if a line is the bare separator `+`
 *
 * @performance O(1)
 */
export function isBareSeparator(line: string): boolean {
  return line === RECORD_MARKERS.SEPARATOR;
}

/**
 * Check if a line is a separator repeating the read id (`+<id>`) or the
 * whole header title
 *
 * @param line - Separator line
 * @param headerLine - Header line of the same record, including '@'
 *
 * @performance O(n) in the id length
 */
export function isHeaderRepeatSeparator(line: string, headerLine: string): boolean {
  if (!line.startsWith(RECORD_MARKERS.SEPARATOR)) return false;
  const repeated = line.substring(1);
  const id = extractId(headerLine);
  return id !== "" && (repeated === id || repeated === headerLine.substring(1));
}

/**
 * Check that every base is one of A, C, G, T, N (case-insensitive)
 *
 * @performance O(n) - single pass over char codes
 */
export function hasOnlyValidBases(sequence: string): boolean {
  for (let i = 0; i < sequence.length; i++) {
    switch (sequence.charCodeAt(i)) {
      case 65: // A
      case 97: // a
      case 67: // C
      case 99: // c
      case 71: // G
      case 103: // g
      case 84: // T
      case 116: // t
      case 78: // N
      case 110: // n
        break;
      default:
        return false;
    }
  }
  return true;
}

/**
 * Check if sequence and quality strings have matching lengths
 *
 * @performance O(1)
 */
export function lengthsMatch(sequence: string, quality: string): boolean {
  return sequence.length === quality.length;
}

// ============================================================================
// EXTRACTION PRIMITIVES
// ============================================================================

/**
 * Extract record ID from FASTQ header line
 *
 * @param headerLine - Header line starting with '@'
 * @returns Sequence ID (without '@' prefix)
 */
export function extractId(headerLine: string): string {
  return headerLine.substring(1).split(/\s/)[0] ?? "";
}

// ============================================================================
// COMPOSITION PRIMITIVES
// ============================================================================

/**
 * Percentage of G and C bases in a sequence, in [0, 100]
 *
 * An empty sequence has a GC percentage of 0.
 *
 * @performance O(n)
 */
export function gcPercent(sequence: string): number {
  if (sequence.length === 0) return 0;

  let gc = 0;
  for (let i = 0; i < sequence.length; i++) {
    const code = sequence.charCodeAt(i);
    if (code === 71 || code === 67 || code === 103 || code === 99) gc++;
  }
  return (gc / sequence.length) * 100;
}

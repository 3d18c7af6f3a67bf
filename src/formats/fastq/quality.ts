/**
 * Phred+33 quality score decoding
 *
 * Converts quality characters to integer Phred scores with
 * `score = charCode - 33`. Phred+33 ("Sanger") is the only encoding
 * accepted; legacy Phred+64 and Solexa inputs are not detected.
 */

import { DecodeError } from "../../errors";
import { PHRED33 } from "./constants";

/**
 * Branded type for Phred+33 quality scores
 * @minimum 0
 * @maximum 93
 */
export type QualityScore = number & {
  readonly __brand: "QualityScore";
};

/**
 * Type guard to validate the Phred+33 score range
 */
export const isValidQualityScore = (score: number): score is QualityScore => {
  return Number.isInteger(score) && score >= 0 && score <= PHRED33.MAX_SCORE;
};

/**
 * Convert a single quality character to its Phred score
 *
 * @throws {DecodeError} When the character is outside '!'..'~' (ASCII 33-126)
 *
 * @example
 * ```typescript
 * charToScore('I'); // 40
 * charToScore('!'); // 0
 * charToScore('~'); // 93
 * ```
 */
export function charToScore(char: string, position = 0): QualityScore {
  const charCode = char.charCodeAt(0);
  const score = charCode - PHRED33.OFFSET;
  if (!isValidQualityScore(score)) {
    throw invalidCharacter(charCode, position);
  }
  return score;
}

/**
 * Convert a Phred score to its quality character
 *
 * @throws {RangeError} When the score is not an integer in 0..93
 *
 * @example
 * ```typescript
 * scoreToChar(40); // 'I'
 * scoreToChar(0);  // '!'
 * ```
 */
export function scoreToChar(score: number): string {
  if (!isValidQualityScore(score)) {
    throw new RangeError(
      `Invalid quality score ${score}. Must be an integer between 0 and ${PHRED33.MAX_SCORE}.`
    );
  }
  return String.fromCharCode(score + PHRED33.OFFSET);
}

/**
 * Decode a quality string into one score per character
 *
 * @param quality - Phred+33 quality string
 * @returns Scores in input order, same length as the string
 * @throws {DecodeError} On the first character outside ASCII 33-126
 *
 * @performance O(n) - single pass over char codes
 */
export function decodeQuality(quality: string): QualityScore[] {
  const scores: QualityScore[] = new Array<QualityScore>(quality.length);

  for (let i = 0; i < quality.length; i++) {
    const charCode = quality.charCodeAt(i);
    const score = charCode - PHRED33.OFFSET;
    if (!isValidQualityScore(score)) {
      throw invalidCharacter(charCode, i);
    }
    scores[i] = score;
  }

  return scores;
}

/**
 * Encode scores back into a Phred+33 quality string
 *
 * @throws {RangeError} When any score is outside 0..93
 */
export function encodeScores(scores: readonly number[]): string {
  return scores.map(scoreToChar).join("");
}

function invalidCharacter(charCode: number, position: number): DecodeError {
  return new DecodeError(
    `Invalid quality character (ASCII ${charCode}) at position ${position}. ` +
      `Phred+33 range: ! to ~ (ASCII ${PHRED33.MIN_CHAR_CODE}-${PHRED33.MAX_CHAR_CODE})`,
    position,
    charCode
  );
}

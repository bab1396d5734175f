/**
 * Combine lexical and oracle confidences into the final verdict
 * Weighting: 30% lexical, 70% oracle
 */

import type { FusionResult } from "../model";

export const LEXICAL_WEIGHT = 0.3;
export const ORACLE_WEIGHT = 0.7;
export const RELATED_THRESHOLD = 0.5;

/**
 * With no matched terms the oracle was never asked and the unit is negative.
 * The oracle's own boolean is accepted for logging; only the combined score decides.
 */
export function fuse(
  lexicalConfidence: number,
  matchedTermCount: number,
  oracleHasRelation: boolean,
  oracleConfidence: number
): FusionResult {
  if (matchedTermCount === 0) {
    return { finalRelated: false, combinedConfidence: 0 };
  }

  const combinedConfidence = LEXICAL_WEIGHT * lexicalConfidence + ORACLE_WEIGHT * oracleConfidence;

  return {
    // strictly greater: exactly 0.5 is negative
    finalRelated: combinedConfidence > RELATED_THRESHOLD,
    combinedConfidence,
  };
}

/**
 * Lexical scoring against the topic profile's term lists
 * Local, deterministic first stage: decides whether the oracle is consulted at all
 */

import type { LexicalResult, TopicProfile } from "../model";

export const PRIMARY_TERM_WEIGHT = 0.3;
// Caps the primary contribution at the full scale, not 0.7
export const PRIMARY_SCORE_CAP = 1.0;
export const SECONDARY_TERM_WEIGHT = 0.05;
export const SECONDARY_SCORE_CAP = 0.3;

type TermLists = Pick<TopicProfile, "primaryTerms" | "secondaryTerms">;

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wholeWordPattern(term: string): RegExp {
  let pattern = patternCache.get(term);
  if (!pattern) {
    pattern = new RegExp(`\\b${escapeRegExp(term.toLowerCase())}\\b`);
    patternCache.set(term, pattern);
  }
  return pattern;
}

function findTerms(lowerText: string, terms: string[]): string[] {
  const found: string[] = [];
  for (const term of terms) {
    if (!found.includes(term) && wholeWordPattern(term).test(lowerText)) {
      found.push(term);
    }
  }
  return found;
}

/**
 * Confidence from primary and secondary match counts
 */
export function lexicalConfidence(primaryCount: number, secondaryCount: number): number {
  const primaryScore = Math.min(primaryCount * PRIMARY_TERM_WEIGHT, PRIMARY_SCORE_CAP);
  const secondaryScore = Math.min(secondaryCount * SECONDARY_TERM_WEIGHT, SECONDARY_SCORE_CAP);
  return Math.min(primaryScore + secondaryScore, 1.0);
}

/**
 * Score text by case-insensitive whole-word matches of the profile terms
 */
export function scoreLexical(text: string | null | undefined, terms: TermLists): LexicalResult {
  if (!text) {
    return { confidence: 0, matchedTerms: [] };
  }

  const lowerText = text.toLowerCase();
  const primary = findTerms(lowerText, terms.primaryTerms);
  const secondary = findTerms(lowerText, terms.secondaryTerms);

  return {
    confidence: lexicalConfidence(primary.length, secondary.length),
    matchedTerms: [...primary, ...secondary],
  };
}

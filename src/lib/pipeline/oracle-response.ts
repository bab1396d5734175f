/**
 * Parse the oracle's free-form reply into a verdict
 *
 * The model is asked for a bare JSON object but may wrap it in prose or a
 * markdown fence, so the first well-formed object in the text is used.
 */

import { z } from "zod";

export interface OracleVerdict {
  hasRelation: boolean;
  confidence: number;
  reasoning: string;
}

const VerdictSchema = z.object({
  has_relation: z.boolean().optional().catch(undefined),
  hasRelation: z.boolean().optional().catch(undefined),
  confidence: z.coerce.number().optional().catch(undefined),
  reasoning: z.string().optional().catch(undefined),
});

/**
 * End index (exclusive) of the balanced object starting at `start`, or -1
 */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * First substring of `text` that parses as a JSON object
 */
export function extractFirstJsonObject(text: string): object | null {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = matchingBrace(text, start);
    if (end === -1) continue;

    try {
      const parsed: unknown = JSON.parse(text.slice(start, end));
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        return parsed;
      }
    } catch {
      // not JSON from this brace; try the next one
    }
  }
  return null;
}

function clampConfidence(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Verdict from the reply text, or null when it holds no JSON object.
 * Missing or mistyped fields fall back to false / 0 / "".
 */
export function parseOracleResponse(text: string): OracleVerdict | null {
  const json = extractFirstJsonObject(text);
  if (!json) {
    return null;
  }

  const fields = VerdictSchema.parse(json);
  return {
    hasRelation: (fields.has_relation ?? fields.hasRelation) === true,
    confidence: clampConfidence(fields.confidence),
    reasoning: fields.reasoning ?? "",
  };
}

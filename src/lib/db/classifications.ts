/**
 * Classification outcomes: write side of the store
 *
 * One debate_classifications row per debate, mirrored onto every speech of
 * that debate in the same transaction.
 */

import type { ClassificationOutcome } from "../model";
import { logger as rootLogger } from "../logger";
import { type DatabaseClient, upsertSyntax } from "./driver";

const logger = rootLogger.child("db");

export const MAX_STORED_TERMS = 10;

export interface ClassificationStats {
  debatesClassified: number;
  debatesRelated: number;
  speechesRelated: number;
  speechesTotal: number;
}

export interface RelatedSpeech {
  speechId: string;
  debateId: string;
  date: string;
  heading: string;
  speakerName: string | null;
  speechText: string;
  confidence: number;
  reasoning: string;
}

function toNumber(value: unknown): number {
  // pg returns COUNT/SUM as strings, SQLite SUM over no rows as null
  if (value === null || value === undefined) return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Upsert the outcome for a debate and propagate it to the debate's speeches
 */
export async function saveOutcome(db: DatabaseClient, outcome: ClassificationOutcome): Promise<void> {
  const terms = outcome.matchedTerms.slice(0, MAX_STORED_TERMS);
  const related = outcome.finalRelated ? 1 : 0;

  await db.transaction(async (tx) => {
    await tx.run(
      `INSERT INTO debate_classifications
       (debate_id, related, combined_confidence, lexical_confidence, oracle_confidence, matched_terms, reasoning, classified_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ${upsertSyntax("debate_id", [
         "related",
         "combined_confidence",
         "lexical_confidence",
         "oracle_confidence",
         "matched_terms",
         "reasoning",
         "classified_at",
       ])}`,
      [
        outcome.unitId,
        related,
        outcome.combinedConfidence,
        outcome.lexicalConfidence,
        outcome.oracleConfidence,
        JSON.stringify(terms),
        outcome.reasoning,
        Math.floor(Date.now() / 1000),
      ]
    );

    const { changes } = await tx.run(
      `UPDATE speeches
       SET topic_related = ?,
           topic_confidence = ?,
           topic_keyword_confidence = ?,
           topic_llm_confidence = ?,
           topic_keywords_found = ?,
           topic_llm_reasoning = ?
       WHERE debate_id = ?`,
      [
        related,
        outcome.combinedConfidence,
        outcome.lexicalConfidence,
        outcome.oracleConfidence,
        terms.join(", "),
        outcome.reasoning,
        outcome.unitId,
      ]
    );

    logger.debug(`Saved outcome for ${outcome.unitId}`, { related: outcome.finalRelated, speeches: changes });
  });
}

/**
 * Stored outcome for one debate, or null if it has not been classified
 */
export async function getOutcome(db: DatabaseClient, debateId: string): Promise<ClassificationOutcome | null> {
  const { rows } = await db.query(
    `SELECT debate_id, related, combined_confidence, lexical_confidence, oracle_confidence, matched_terms, reasoning
     FROM debate_classifications WHERE debate_id = ?`,
    [debateId]
  );
  const row = rows[0];
  if (!row) {
    return null;
  }

  const parsedTerms: unknown = JSON.parse(typeof row.matched_terms === "string" ? row.matched_terms : "[]");
  return {
    unitId: String(row.debate_id),
    finalRelated: toNumber(row.related) === 1,
    combinedConfidence: toNumber(row.combined_confidence),
    lexicalConfidence: toNumber(row.lexical_confidence),
    oracleConfidence: toNumber(row.oracle_confidence),
    matchedTerms: Array.isArray(parsedTerms) ? parsedTerms.map(String) : [],
    reasoning: typeof row.reasoning === "string" ? row.reasoning : "",
  };
}

/**
 * Counts of classified/related debates and related speeches
 */
export async function getClassificationStats(db: DatabaseClient): Promise<ClassificationStats> {
  const debates = await db.query(
    "SELECT COUNT(*) AS classified, SUM(related) AS related FROM debate_classifications"
  );
  const speeches = await db.query(
    "SELECT COUNT(*) AS total, SUM(CASE WHEN topic_related = 1 THEN 1 ELSE 0 END) AS related FROM speeches"
  );

  return {
    debatesClassified: toNumber(debates.rows[0]?.classified),
    debatesRelated: toNumber(debates.rows[0]?.related),
    speechesRelated: toNumber(speeches.rows[0]?.related),
    speechesTotal: toNumber(speeches.rows[0]?.total),
  };
}

/**
 * Speeches marked related, ordered by debate date then speech id
 */
export async function listRelatedSpeeches(db: DatabaseClient): Promise<RelatedSpeech[]> {
  const { rows } = await db.query(
    `SELECT s.speech_id, s.debate_id, CAST(d.date AS TEXT) AS date_text, d.major_heading_text,
            s.speaker_name, s.speech_text, s.topic_confidence, s.topic_llm_reasoning
     FROM speeches s
     JOIN debates d ON s.debate_id = d.debate_id
     WHERE s.topic_related = 1
     ORDER BY d.date, s.speech_id`
  );

  return rows.map((row) => ({
    speechId: String(row.speech_id),
    debateId: String(row.debate_id),
    date: String(row.date_text),
    heading: row.major_heading_text == null ? "" : String(row.major_heading_text),
    speakerName: row.speaker_name == null ? null : String(row.speaker_name),
    speechText: row.speech_text == null ? "" : String(row.speech_text),
    confidence: toNumber(row.topic_confidence),
    reasoning: row.topic_llm_reasoning == null ? "" : String(row.topic_llm_reasoning),
  }));
}

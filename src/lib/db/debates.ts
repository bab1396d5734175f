/**
 * Debate work units: read side of the ingestion store
 */

import type { OutcomeSink, WorkUnit, WorkUnitFilter, WorkUnitSource } from "../model";
import type { DatabaseClient, DbExecutor } from "./driver";
import { saveOutcome } from "./classifications";

export const SPEECH_SEPARATOR = "\n\n";

/**
 * Debates with a heading, ordered by date then id, each with the text of its
 * first `maxSpeeches` speeches (by speech id).
 */
export async function listWorkUnits(
  db: DbExecutor,
  filter: WorkUnitFilter,
  maxSpeeches: number
): Promise<WorkUnit[]> {
  const conditions = ["major_heading_text IS NOT NULL"];
  const params: unknown[] = [];

  if (filter.fromDate) {
    conditions.push("date >= ?");
    params.push(filter.fromDate);
  }
  if (filter.toDate) {
    conditions.push("date <= ?");
    params.push(filter.toDate);
  }

  let sql = `
    SELECT DISTINCT debate_id, date, CAST(date AS TEXT) AS date_text, major_heading_text
    FROM debates
    WHERE ${conditions.join(" AND ")}
    ORDER BY date, debate_id
  `;
  if (filter.limit !== undefined) {
    sql += " LIMIT ?";
    params.push(filter.limit);
  }

  const { rows } = await db.query(sql, params);
  const units: WorkUnit[] = [];

  for (const row of rows) {
    const id = String(row.debate_id);
    const speeches = await loadSampleSpeeches(db, id, maxSpeeches);
    units.push({
      id,
      date: String(row.date_text),
      title: String(row.major_heading_text),
      sampleText: speeches.join(SPEECH_SEPARATOR),
      speechCount: speeches.length,
    });
  }

  return units;
}

/**
 * Text of the first `limit` non-empty speeches of a debate
 */
export async function loadSampleSpeeches(db: DbExecutor, debateId: string, limit: number): Promise<string[]> {
  const { rows } = await db.query(
    `SELECT speech_text FROM speeches
     WHERE debate_id = ? AND speech_text IS NOT NULL
     ORDER BY speech_id
     LIMIT ?`,
    [debateId, limit]
  );
  return rows.map((row) => String(row.speech_text));
}

/**
 * Store backed by the database: reads work units and writes their outcomes
 */
export function createDebateStore(
  db: DatabaseClient,
  options: { maxSpeechesPerUnit: number }
): WorkUnitSource & OutcomeSink {
  return {
    listWorkUnits: (filter) => listWorkUnits(db, filter, options.maxSpeechesPerUnit),
    saveOutcome: (outcome) => saveOutcome(db, outcome),
  };
}

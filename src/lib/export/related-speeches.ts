/**
 * Export the speeches of related debates as JSON Lines
 */

import * as fs from "fs";
import * as path from "path";
import type { DatabaseClient } from "../db/driver";
import { listRelatedSpeeches } from "../db/classifications";
import { logger } from "../logger";

/**
 * Write one JSON object per related speech to `outputPath`. Returns the count.
 */
export async function exportRelatedSpeeches(db: DatabaseClient, outputPath: string): Promise<number> {
  const speeches = await listRelatedSpeeches(db);

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const body = speeches
    .map((speech) =>
      JSON.stringify({
        speech_id: speech.speechId,
        debate_id: speech.debateId,
        date: speech.date,
        heading: speech.heading,
        speaker_name: speech.speakerName,
        speech_text: speech.speechText,
        topic_confidence: speech.confidence,
        topic_llm_reasoning: speech.reasoning,
      })
    )
    .join("\n");
  fs.writeFileSync(outputPath, speeches.length > 0 ? `${body}\n` : "");

  logger.info(`Exported ${speeches.length} related speeches to ${outputPath}`);
  return speeches.length;
}

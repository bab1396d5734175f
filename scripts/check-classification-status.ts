/**
 * Show how far classification has got in the store
 *
 * Usage: npx tsx scripts/check-classification-status.ts [--debate=<debate_id>]
 */

import * as dotenv from "dotenv";
import * as path from "path";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });

import { assertStoreExists, initializeDatabase, type DatabaseClient } from "../src/lib/db/index";
import { getClassificationStats, getOutcome } from "../src/lib/db/classifications";
import { logger } from "../src/lib/logger";

async function printDebate(db: DatabaseClient, debateId: string) {
  const outcome = await getOutcome(db, debateId);
  if (!outcome) {
    console.log(`\nDebate ${debateId} has not been classified\n`);
    return;
  }

  console.log(`\n=== ${debateId} ===\n`);
  console.log(`  Related:             ${outcome.finalRelated}`);
  console.log(`  Combined confidence: ${outcome.combinedConfidence.toFixed(2)}`);
  console.log(`  Keyword confidence:  ${outcome.lexicalConfidence.toFixed(2)}`);
  console.log(`  LLM confidence:      ${outcome.oracleConfidence.toFixed(2)}`);
  console.log(`  Matched terms:       ${outcome.matchedTerms.join(", ") || "none"}`);
  console.log(`  Reasoning:           ${outcome.reasoning || "-"}\n`);
}

async function printStats(db: DatabaseClient) {
  const stats = await getClassificationStats(db);
  const speechRate = (stats.speechesRelated / Math.max(stats.speechesTotal, 1)) * 100;

  console.log("\n=== Classification status ===\n");
  console.log(`  Debates classified:  ${stats.debatesClassified}`);
  console.log(`  Debates related:     ${stats.debatesRelated}`);
  console.log(`  Related speeches:    ${stats.speechesRelated} of ${stats.speechesTotal} (${speechRate.toFixed(1)}%)\n`);
}

async function main() {
  const debateArg = process.argv.slice(2).find((arg) => arg.startsWith("--debate="));

  assertStoreExists();
  const db = await initializeDatabase();

  try {
    if (debateArg) {
      await printDebate(db, debateArg.slice("--debate=".length));
    } else {
      await printStats(db);
    }
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  logger.error("Status check failed", error);
  process.exit(1);
});

/**
 * Export speeches of debates marked related as JSON Lines
 *
 * Usage: npx tsx scripts/export-related-speeches.ts [--out=exports/related-speeches.jsonl]
 */

import * as dotenv from "dotenv";
import * as path from "path";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });

import { assertStoreExists, initializeDatabase } from "../src/lib/db/index";
import { exportRelatedSpeeches } from "../src/lib/export/related-speeches";
import { logger } from "../src/lib/logger";

const DEFAULT_OUTPUT = path.join("exports", "related-speeches.jsonl");

async function main() {
  const outArg = process.argv.slice(2).find((arg) => arg.startsWith("--out="));
  const outputPath = path.resolve(process.cwd(), outArg ? outArg.slice("--out=".length) : DEFAULT_OUTPUT);

  assertStoreExists();
  const db = await initializeDatabase();
  try {
    const count = await exportRelatedSpeeches(db, outputPath);
    if (count === 0) {
      console.log("\nNo related speeches found - run scripts/classify-debates.ts first\n");
    } else {
      console.log(`\n✓ ${count} related speeches written to ${outputPath}\n`);
    }
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  logger.error("Export failed", error);
  process.exit(1);
});

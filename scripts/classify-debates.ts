/**
 * Classify debates against the topic profile (Brexit by default)
 *
 * Keyword scoring first; debates with any matched term go to the LLM.
 * Stops once COST_LIMIT_USD is reached; the debate that crosses it is kept.
 *
 * Usage: npx tsx scripts/classify-debates.ts [--from=YYYY-MM-DD] [--to=YYYY-MM-DD] [--limit=N]
 */

import * as dotenv from "dotenv";
import * as path from "path";

// Load .env.local
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });

import { loadClassifierConfig, parseFilterArgs } from "../src/config/classifier";
import { assertStoreExists, initializeDatabase } from "../src/lib/db/index";
import { createDebateStore } from "../src/lib/db/debates";
import { CostLedger } from "../src/lib/cost-ledger";
import { MinIntervalRateLimiter } from "../src/lib/rate-limit";
import { OracleClient, createOpenAITransport } from "../src/lib/pipeline/oracle";
import { formatRunReport, runClassification } from "../src/lib/pipeline/classify";
import { ClassificationRunError, ConfigError } from "../src/lib/errors";
import { logger } from "../src/lib/logger";

async function main() {
  console.log("\n=== Classifying debates ===\n");

  // Configuration problems stop the run before the store is touched
  const config = loadClassifierConfig();
  const filter = parseFilterArgs(process.argv.slice(2));

  console.log(`Subject: ${config.profile.subject}`);
  console.log(`Model:   ${config.oracle.model}`);
  console.log(`Budget:  $${config.pricing.budgetCeilingUsd.toFixed(2)}\n`);

  assertStoreExists();
  const db = await initializeDatabase();
  const store = createDebateStore(db, { maxSpeechesPerUnit: config.maxSpeechesPerUnit });

  try {
    const report = await runClassification({
      source: store,
      sink: store,
      oracle: new OracleClient({
        transport: createOpenAITransport(config.oracle),
        profile: config.profile,
        config: config.oracle,
        rateLimiter: new MinIntervalRateLimiter(),
        minIntervalSeconds: config.minIntervalSeconds,
      }),
      ledger: new CostLedger(config.pricing),
      profile: config.profile,
      filter,
    });

    console.log(`\n${formatRunReport(report)}\n`);
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`\n✗ ${error.message}\n`);
  } else if (error instanceof ClassificationRunError) {
    logger.error("Classification stopped", error.toJSON());
    if (error.report) {
      console.error(`\n${formatRunReport(error.report)}\n`);
    }
  } else {
    logger.error("Classification failed", error);
  }
  process.exit(1);
});

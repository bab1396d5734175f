/**
 * Batch classification of debates
 *
 * Per unit: lexical score → (skip | oracle → ledger → fusion) → persist.
 * Units run strictly one after another; the oracle client throttles each of
 * its calls through its rate limiter. The budget is checked after each unit is persisted;
 * the unit that crosses the ceiling is kept.
 */

import type {
  ClassificationOutcome,
  OracleResult,
  OutcomeSink,
  RunReport,
  RunStatus,
  TopicProfile,
  WorkUnit,
  WorkUnitFilter,
  WorkUnitSource,
} from "../model";
import type { CostLedger } from "../cost-ledger";
import { ClassificationRunError } from "../errors";
import { logger as rootLogger } from "../logger";
import { scoreLexical } from "./lexicon";
import { fuse } from "./fusion";

const logger = rootLogger.child("classify");

export const MAX_OUTCOME_TERMS = 10;

/**
 * Everything a run needs, owned by the caller for the run's lifetime
 */
export interface ClassificationContext {
  source: WorkUnitSource;
  sink: OutcomeSink;
  oracle: { classify(unit: WorkUnit, matchedTerms: string[]): Promise<OracleResult> };
  ledger: CostLedger;
  profile: TopicProfile;
  filter?: WorkUnitFilter;
}

interface RunCounters {
  processed: number;
  skipped: number;
  oracleInvoked: number;
  positive: number;
}

function buildReport(
  status: RunStatus,
  totalUnits: number,
  counters: RunCounters,
  ledger: CostLedger
): RunReport {
  const totals = ledger.snapshot();
  return {
    status,
    totalUnits,
    ...counters,
    remaining: totalUnits - counters.processed,
    inputTokens: totals.inputTokens,
    outputTokens: totals.outputTokens,
    costUsd: totals.costUsd,
    budgetCeilingUsd: totals.budgetCeilingUsd,
  };
}

async function fetchUnits(context: ClassificationContext): Promise<WorkUnit[]> {
  let units: WorkUnit[];
  try {
    units = await context.source.listWorkUnits(context.filter ?? {});
  } catch (error) {
    throw new ClassificationRunError("UPSTREAM_UNAVAILABLE", "Could not read work units from the store", {
      cause: error,
      context: { filter: context.filter ?? {} },
    });
  }

  if (units.length === 0) {
    throw new ClassificationRunError("NO_WORK_UNITS", "The store holds no debates to classify", {
      context: { filter: context.filter ?? {} },
    });
  }
  return units;
}

/**
 * Classify a single unit. Returns the outcome and whether the oracle was consulted.
 */
async function classifyUnit(
  unit: WorkUnit,
  context: ClassificationContext
): Promise<{ outcome: ClassificationOutcome; oracleInvoked: boolean }> {
  const lexical = scoreLexical(unit.sampleText, context.profile);
  logger.info(`  Keywords: ${lexical.matchedTerms.length} found, confidence ${lexical.confidence.toFixed(2)}`);

  if (lexical.matchedTerms.length === 0) {
    return {
      oracleInvoked: false,
      outcome: {
        unitId: unit.id,
        finalRelated: false,
        combinedConfidence: 0,
        lexicalConfidence: 0,
        oracleConfidence: 0,
        matchedTerms: [],
        reasoning: "",
      },
    };
  }

  const oracle = await context.oracle.classify(unit, lexical.matchedTerms);

  const callCost = context.ledger.recordUsage(oracle.inputTokens, oracle.outputTokens);
  logger.info(`  Oracle: ${oracle.hasRelation}, confidence ${oracle.confidence.toFixed(2)}`, {
    callCostUsd: Number(callCost.toFixed(6)),
    totalCostUsd: Number(context.ledger.currentCostUSD().toFixed(4)),
  });

  const fusion = fuse(lexical.confidence, lexical.matchedTerms.length, oracle.hasRelation, oracle.confidence);

  return {
    oracleInvoked: true,
    outcome: {
      unitId: unit.id,
      finalRelated: fusion.finalRelated,
      combinedConfidence: fusion.combinedConfidence,
      lexicalConfidence: lexical.confidence,
      oracleConfidence: oracle.confidence,
      matchedTerms: lexical.matchedTerms.slice(0, MAX_OUTCOME_TERMS),
      reasoning: oracle.reasoning,
    },
  };
}

/**
 * Run the classifier over every work unit, stopping early once the budget is spent.
 *
 * Throws ClassificationRunError when the store cannot be read, holds no units,
 * or rejects a write; in the last case the error carries the partial report.
 */
export async function runClassification(context: ClassificationContext): Promise<RunReport> {
  const units = await fetchUnits(context);
  const counters: RunCounters = { processed: 0, skipped: 0, oracleInvoked: 0, positive: 0 };

  logger.info(`Found ${units.length} debates to classify`, {
    budgetUsd: context.ledger.snapshot().budgetCeilingUsd,
  });

  for (const [index, unit] of units.entries()) {
    logger.info(`[${index + 1}/${units.length}] ${unit.date} - ${unit.title.slice(0, 50)}`);

    const { outcome, oracleInvoked } = await classifyUnit(unit, context);

    try {
      await context.sink.saveOutcome(outcome);
    } catch (error) {
      const report = buildReport("failed", units.length, counters, context.ledger);
      logger.error(`Failed to persist outcome for ${unit.id}, stopping after ${counters.processed} units`, error);
      throw new ClassificationRunError("PERSISTENCE_FAILED", `Could not save outcome for ${unit.id}`, {
        cause: error,
        context: { unitId: unit.id },
        report,
      });
    }

    counters.processed++;
    if (oracleInvoked) counters.oracleInvoked++;
    else counters.skipped++;
    if (outcome.finalRelated) counters.positive++;

    logger.info(`  Final: related=${outcome.finalRelated}, confidence ${outcome.combinedConfidence.toFixed(2)}`);

    if (context.ledger.isExhausted()) {
      const snapshot = context.ledger.snapshot();
      logger.warn("Cost limit reached, stopping", {
        costUsd: Number(snapshot.costUsd.toFixed(4)),
        budgetUsd: snapshot.budgetCeilingUsd,
        processed: counters.processed,
        total: units.length,
      });
      return buildReport("budget_exhausted", units.length, counters, context.ledger);
    }
  }

  return buildReport("completed", units.length, counters, context.ledger);
}

/**
 * Multi-line run summary for the console
 */
export function formatRunReport(report: RunReport): string {
  const rate = (report.positive / Math.max(report.processed, 1)) * 100;
  const lines = [
    report.status === "budget_exhausted" ? "ABORTED - COST LIMIT REACHED" : report.status === "failed" ? "FAILED" : "DONE",
    `  Debates processed:   ${report.processed} of ${report.totalUnits}`,
    `  Skipped (no terms):  ${report.skipped}`,
    `  Oracle calls:        ${report.oracleInvoked}`,
    `  Related:             ${report.positive}`,
    `  Related rate:        ${rate.toFixed(1)}%`,
    `  Input tokens:        ${report.inputTokens}`,
    `  Output tokens:       ${report.outputTokens}`,
    `  Total cost:          $${report.costUsd.toFixed(2)} of $${report.budgetCeilingUsd.toFixed(2)}`,
  ];
  if (report.status === "budget_exhausted") {
    lines.push(`  Stopped early: ${report.remaining} debates not processed`);
  }
  return lines.join("\n");
}

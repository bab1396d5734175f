/**
 * Tests for the batch classification run
 */

import { describe, it, expect, vi } from "vitest";
import { formatRunReport, runClassification, type ClassificationContext } from "../../../src/lib/pipeline/classify";
import { CostLedger } from "../../../src/lib/cost-ledger";
import { MinIntervalRateLimiter } from "../../../src/lib/rate-limit";
import { OracleClient, type OracleCompletion } from "../../../src/lib/pipeline/oracle";
import { ClassificationRunError } from "../../../src/lib/errors";
import type { ClassificationOutcome, OracleResult, TopicProfile, WorkUnit } from "../../../src/lib/model";

const profile: TopicProfile = {
  subject: "Brexit",
  description: "the UK's withdrawal from the European Union",
  considerations: [],
  primaryTerms: ["brexit", "article 50"],
  secondaryTerms: ["single market"],
};

function unit(id: string, sampleText: string): WorkUnit {
  return { id, date: "2017-03-29", title: `Debate ${id}`, sampleText, speechCount: 1 };
}

const UNITS = [
  unit("d1", "Brexit and Article 50"),
  unit("d2", "Fisheries quotas"),
  unit("d3", "Access to the single market"),
  unit("d4", "Brexit negotiations"),
];

const RELATED_VERDICT: OracleResult = {
  hasRelation: true,
  confidence: 0.8,
  reasoning: "About leaving the EU.",
  inputTokens: 1_000_000,
  outputTokens: 0,
};

function createContext(overrides: Partial<ClassificationContext> = {}) {
  const saved: ClassificationOutcome[] = [];

  const oracle = {
    classify: vi.fn(async (_unit: WorkUnit, _terms: string[]): Promise<OracleResult> => RELATED_VERDICT),
  };
  const context: ClassificationContext = {
    source: { listWorkUnits: async () => UNITS },
    sink: {
      saveOutcome: async (outcome) => {
        saved.push(outcome);
      },
    },
    oracle,
    ledger: new CostLedger({ budgetCeilingUsd: 100, inputPricePerMillion: 1, outputPricePerMillion: 1 }),
    profile,
    ...overrides,
  };

  return { context, oracle, saved };
}

describe("runClassification", () => {
  it("should only consult the oracle for units with matched terms", async () => {
    const { context, oracle, saved } = createContext();

    const report = await runClassification(context);

    expect(oracle.classify).toHaveBeenCalledTimes(3);
    expect(oracle.classify.mock.calls.map(([u]) => u.id)).toEqual(["d1", "d3", "d4"]);
    expect(saved.find((outcome) => outcome.unitId === "d2")).toEqual({
      unitId: "d2",
      finalRelated: false,
      combinedConfidence: 0,
      lexicalConfidence: 0,
      oracleConfidence: 0,
      matchedTerms: [],
      reasoning: "",
    });
    expect(report).toMatchObject({
      status: "completed",
      totalUnits: 4,
      processed: 4,
      skipped: 1,
      oracleInvoked: 3,
      remaining: 0,
    });
  });

  it("should pass matched terms to the oracle", async () => {
    const { context, oracle } = createContext();

    await runClassification(context);

    expect(oracle.classify.mock.calls[0][1]).toEqual(["brexit", "article 50"]);
  });

  it("should persist fused outcomes in unit order", async () => {
    const { context, saved } = createContext();

    const report = await runClassification(context);

    expect(saved.map((outcome) => outcome.unitId)).toEqual(["d1", "d2", "d3", "d4"]);

    const first = saved[0];
    expect(first.finalRelated).toBe(true);
    expect(first.lexicalConfidence).toBeCloseTo(0.6);
    expect(first.oracleConfidence).toBe(0.8);
    expect(first.combinedConfidence).toBeCloseTo(0.74);
    expect(first.matchedTerms).toEqual(["brexit", "article 50"]);
    expect(first.reasoning).toBe("About leaving the EU.");

    // single secondary term: 0.3 * 0.05 + 0.7 * 0.8
    expect(saved[2].combinedConfidence).toBeCloseTo(0.575);
    expect(report.positive).toBe(3);
  });

  it("should stop after the unit that reaches the budget", async () => {
    const { context, oracle, saved } = createContext({
      ledger: new CostLedger({ budgetCeilingUsd: 2, inputPricePerMillion: 1, outputPricePerMillion: 1 }),
    });

    const report = await runClassification(context);

    expect(oracle.classify).toHaveBeenCalledTimes(2);
    expect(saved.map((outcome) => outcome.unitId)).toEqual(["d1", "d2", "d3"]);
    expect(report).toMatchObject({
      status: "budget_exhausted",
      processed: 3,
      remaining: 1,
      inputTokens: 2_000_000,
      costUsd: 2,
      budgetCeilingUsd: 2,
    });
  });

  it("should stop after the first unit when it alone exhausts the budget", async () => {
    const { context, saved } = createContext({
      ledger: new CostLedger({ budgetCeilingUsd: 0.5, inputPricePerMillion: 1, outputPricePerMillion: 1 }),
    });

    const report = await runClassification(context);

    expect(saved.map((outcome) => outcome.unitId)).toEqual(["d1"]);
    expect(report.status).toBe("budget_exhausted");
    expect(report.remaining).toBe(3);
  });

  it("should store at most 10 matched terms", async () => {
    const manyTerms = Array.from({ length: 12 }, (_, i) => `term${i + 1}`);
    const { context, saved } = createContext({
      profile: { ...profile, primaryTerms: ["brexit"], secondaryTerms: manyTerms },
      source: { listWorkUnits: async () => [unit("d1", `brexit ${manyTerms.join(" ")}`)] },
    });

    await runClassification(context);

    expect(saved[0].matchedTerms).toHaveLength(10);
    expect(saved[0].matchedTerms.slice(0, 2)).toEqual(["brexit", "term1"]);
  });

  it("should record oracle failures as negative outcomes", async () => {
    const failed: OracleResult = {
      hasRelation: false,
      confidence: 0,
      reasoning: "Rate Limit Error after retries",
      inputTokens: 0,
      outputTokens: 0,
    };
    const { context, saved } = createContext({ oracle: { classify: async () => failed } });

    const report = await runClassification(context);

    expect(saved[0].finalRelated).toBe(false);
    expect(saved[0].combinedConfidence).toBeCloseTo(0.18);
    expect(saved[0].reasoning).toBe("Rate Limit Error after retries");
    expect(report.costUsd).toBe(0);
  });

  it("should produce the same outcomes when run again", async () => {
    const first = createContext();
    const second = createContext();

    await runClassification(first.context);
    await runClassification(second.context);

    expect(second.saved).toEqual(first.saved);
  });

  it("should pass the filter to the source", async () => {
    const listWorkUnits = vi.fn(async () => UNITS);
    const { context } = createContext({
      source: { listWorkUnits },
      filter: { fromDate: "2016-01-01", limit: 4 },
    });

    await runClassification(context);

    expect(listWorkUnits).toHaveBeenCalledWith({ fromDate: "2016-01-01", limit: 4 });
  });

  it("should fail when the source cannot be read", async () => {
    const { context, oracle } = createContext({
      source: {
        listWorkUnits: async () => {
          throw new Error("no such table: debates");
        },
      },
    });

    await expect(runClassification(context)).rejects.toMatchObject({ code: "UPSTREAM_UNAVAILABLE" });
    expect(oracle.classify).not.toHaveBeenCalled();
  });

  it("should fail when there are no units", async () => {
    const { context } = createContext({ source: { listWorkUnits: async () => [] } });

    await expect(runClassification(context)).rejects.toMatchObject({ code: "NO_WORK_UNITS" });
  });

  it("should stop with a partial report when an outcome cannot be saved", async () => {
    let saves = 0;
    const { context } = createContext({
      sink: {
        saveOutcome: async () => {
          saves++;
          if (saves === 2) throw new Error("database is locked");
        },
      },
    });

    const error = await runClassification(context).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ClassificationRunError);
    if (!(error instanceof ClassificationRunError)) return;
    expect(error.code).toBe("PERSISTENCE_FAILED");
    expect(error.report).toMatchObject({ status: "failed", processed: 1, remaining: 3 });
  });
});

describe("runClassification call spacing", () => {
  const VERDICT = '{"has_relation": true, "confidence": 0.8, "reasoning": "About leaving the EU."}';

  /**
   * Real oracle client and rate limiter sharing one fake clock; the first
   * transport call is rate limited. Returns the clock time of every call.
   */
  async function transportCallTimes(minIntervalSeconds: number): Promise<number[]> {
    let now = 0;
    const callTimes: number[] = [];
    const advance = async (ms: number) => {
      now += ms;
    };

    const oracle = new OracleClient({
      transport: {
        complete: async (): Promise<OracleCompletion> => {
          callTimes.push(now);
          if (callTimes.length === 1) throw new Error("429 quota exceeded");
          return { text: VERDICT };
        },
      },
      profile,
      config: { timeoutMs: 1000, maxRetries: 5, backoffBaseSeconds: 6, maxPromptTerms: 10, promptExcerptChars: 8000 },
      sleep: advance,
      rateLimiter: new MinIntervalRateLimiter({ now: () => now, sleep: advance }),
      minIntervalSeconds,
    });

    const { context } = createContext({ oracle });
    await runClassification(context);
    return callTimes;
  }

  it("should space the next unit's call from a successful retry", async () => {
    expect(await transportCallTimes(6)).toEqual([0, 6000, 12000, 18000]);
  });

  it("should hold a retry back when the interval is longer than the backoff", async () => {
    expect(await transportCallTimes(10)).toEqual([0, 10000, 20000, 30000]);
  });

  it("should only apply the backoff with no minimum interval", async () => {
    expect(await transportCallTimes(0)).toEqual([0, 6000, 6000, 6000]);
  });
});

describe("formatRunReport", () => {
  const base = {
    totalUnits: 4,
    processed: 3,
    skipped: 1,
    oracleInvoked: 2,
    positive: 1,
    remaining: 1,
    inputTokens: 2000,
    outputTokens: 100,
    costUsd: 2,
    budgetCeilingUsd: 2,
  };

  it("should flag a budget stop", () => {
    const lines = formatRunReport({ ...base, status: "budget_exhausted" }).split("\n");

    expect(lines[0]).toBe("ABORTED - COST LIMIT REACHED");
    expect(lines).toContain("  Related rate:        33.3%");
    expect(lines).toContain("  Total cost:          $2.00 of $2.00");
    expect(lines[lines.length - 1]).toBe("  Stopped early: 1 debates not processed");
  });

  it("should summarize a completed run", () => {
    const lines = formatRunReport({ ...base, status: "completed", processed: 4, remaining: 0 }).split("\n");

    expect(lines[0]).toBe("DONE");
    expect(lines).toContain("  Debates processed:   4 of 4");
    expect(lines.some((line) => line.includes("Stopped early"))).toBe(false);
  });
});

/**
 * Cost ledger: priced token usage against a hard budget ceiling
 *
 * Totals only grow. Once the cumulative cost reaches the ceiling the ledger
 * stays exhausted for the rest of the run.
 */

import type { PricingConfig } from "../config/classifier";
import type { LedgerSnapshot } from "./model";

const TOKENS_PER_PRICE_UNIT = 1_000_000;

export class CostLedger {
  private inputTokens = 0;
  private outputTokens = 0;
  private costUsd = 0;
  private exhausted = false;

  constructor(private readonly pricing: PricingConfig) {}

  /**
   * Price of a single call in USD
   */
  callCost(inputTokens: number, outputTokens: number): number {
    return (
      (inputTokens / TOKENS_PER_PRICE_UNIT) * this.pricing.inputPricePerMillion +
      (outputTokens / TOKENS_PER_PRICE_UNIT) * this.pricing.outputPricePerMillion
    );
  }

  /**
   * Add one call's usage. Returns that call's cost.
   */
  recordUsage(inputTokens: number, outputTokens: number): number {
    const safeInput = Math.max(0, Math.floor(inputTokens));
    const safeOutput = Math.max(0, Math.floor(outputTokens));
    const cost = this.callCost(safeInput, safeOutput);

    this.inputTokens += safeInput;
    this.outputTokens += safeOutput;
    this.costUsd += cost;

    if (this.costUsd >= this.pricing.budgetCeilingUsd) {
      this.exhausted = true;
    }

    return cost;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  currentCostUSD(): number {
    return this.costUsd;
  }

  snapshot(): LedgerSnapshot {
    return {
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      costUsd: this.costUsd,
      budgetCeilingUsd: this.pricing.budgetCeilingUsd,
      exhausted: this.exhausted,
    };
  }
}

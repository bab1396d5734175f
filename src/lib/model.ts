/**
 * Core data models for the debate topic classifier
 */

/**
 * One debate submitted to the classifier, with a bounded sample of its speeches
 */
export interface WorkUnit {
  id: string;
  date: string; // YYYY-MM-DD
  title: string;
  sampleText: string; // First N speeches joined with a blank line
  speechCount: number; // Speeches included in sampleText
}

export interface WorkUnitFilter {
  fromDate?: string; // inclusive
  toDate?: string; // inclusive
  limit?: number;
}

export interface LexicalResult {
  confidence: number; // 0–1
  matchedTerms: string[]; // primary terms first, then secondary, in profile order
}

export interface OracleResult {
  hasRelation: boolean;
  confidence: number; // 0–1
  reasoning: string;
  inputTokens: number;
  outputTokens: number;
}

export interface FusionResult {
  finalRelated: boolean;
  combinedConfidence: number;
}

export interface ClassificationOutcome {
  unitId: string;
  finalRelated: boolean;
  combinedConfidence: number;
  lexicalConfidence: number;
  oracleConfidence: number;
  matchedTerms: string[]; // at most 10
  reasoning: string;
}

export interface LedgerSnapshot {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  budgetCeilingUsd: number;
  exhausted: boolean;
}

export type RunStatus = "completed" | "budget_exhausted" | "failed";

export interface RunReport {
  status: RunStatus;
  totalUnits: number;
  processed: number;
  skipped: number; // no lexical match, oracle never called
  oracleInvoked: number;
  positive: number;
  remaining: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  budgetCeilingUsd: number;
}

/**
 * Upstream collaborator: enumerates work units in date, id order
 */
export interface WorkUnitSource {
  listWorkUnits(filter: WorkUnitFilter): Promise<WorkUnit[]>;
}

/**
 * Downstream collaborator: stores one outcome per unit, overwriting earlier runs
 */
export interface OutcomeSink {
  saveOutcome(outcome: ClassificationOutcome): Promise<void>;
}

/**
 * Subject the classifier labels debates against
 */
export interface TopicProfile {
  subject: string;
  description: string;
  considerations: string[];
  primaryTerms: string[];
  secondaryTerms: string[];
}

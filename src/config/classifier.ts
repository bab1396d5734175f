/**
 * Run configuration for the classifier, read from the environment
 *
 * Scripts load .env.local with dotenv before calling loadClassifierConfig().
 */

import { z } from "zod";
import { ConfigError } from "../lib/errors";
import type { TopicProfile, WorkUnitFilter } from "../lib/model";
import { loadTopicProfile } from "./topic-profile";

export const DEFAULT_ORACLE_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";
export const DEFAULT_ORACLE_MODEL = "gemini-2.5-flash";

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ORACLE_API_KEY: z
    .string({ required_error: "ORACLE_API_KEY (or GEMINI_API_KEY) is required" })
    .trim()
    .min(1, "ORACLE_API_KEY (or GEMINI_API_KEY) is required"),
  ORACLE_BASE_URL: z.string().url().default(DEFAULT_ORACLE_BASE_URL),
  ORACLE_MODEL: z.string().trim().min(1).default(DEFAULT_ORACLE_MODEL),
  ORACLE_TIMEOUT_MS: positiveInt(60_000),
  ORACLE_MAX_RETRIES: z.coerce.number().int().min(0).default(5),
  ORACLE_BACKOFF_BASE_SECONDS: positiveNumber(6),
  COST_LIMIT_USD: positiveNumber(20),
  INPUT_PRICE_PER_1M: z.coerce.number().min(0).default(0.075),
  OUTPUT_PRICE_PER_1M: z.coerce.number().min(0).default(0.3),
  REQUEST_DELAY_SECONDS: z.coerce.number().min(0).default(6),
  MAX_SPEECHES_PER_UNIT: positiveInt(5),
  PROMPT_EXCERPT_CHARS: positiveInt(8000),
  TOPIC_PROFILE_PATH: z.string().trim().min(1).optional(),
});

export interface OracleConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  backoffBaseSeconds: number;
  promptExcerptChars: number;
  maxPromptTerms: number;
}

export interface PricingConfig {
  budgetCeilingUsd: number;
  inputPricePerMillion: number;
  outputPricePerMillion: number;
}

export interface ClassifierConfig {
  oracle: OracleConfig;
  pricing: PricingConfig;
  minIntervalSeconds: number;
  maxSpeechesPerUnit: number;
  profile: TopicProfile;
}

/**
 * Empty strings count as unset so a blank line in .env.local falls back to the default
 */
function readEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const picked: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    picked[key] = value === undefined || value.trim() === "" ? undefined : value;
  }
  picked.ORACLE_API_KEY ??= env.GEMINI_API_KEY?.trim() || undefined;
  return picked;
}

/**
 * Validate the environment and build the run configuration.
 * Throws ConfigError naming every invalid variable.
 */
export function loadClassifierConfig(env: NodeJS.ProcessEnv = process.env): ClassifierConfig {
  const parsed = EnvSchema.safeParse(readEnv(env));
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid classifier configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    oracle: {
      apiKey: vars.ORACLE_API_KEY,
      baseUrl: vars.ORACLE_BASE_URL,
      model: vars.ORACLE_MODEL,
      timeoutMs: vars.ORACLE_TIMEOUT_MS,
      maxRetries: vars.ORACLE_MAX_RETRIES,
      backoffBaseSeconds: vars.ORACLE_BACKOFF_BASE_SECONDS,
      promptExcerptChars: vars.PROMPT_EXCERPT_CHARS,
      maxPromptTerms: 10,
    },
    pricing: {
      budgetCeilingUsd: vars.COST_LIMIT_USD,
      inputPricePerMillion: vars.INPUT_PRICE_PER_1M,
      outputPricePerMillion: vars.OUTPUT_PRICE_PER_1M,
    },
    minIntervalSeconds: vars.REQUEST_DELAY_SECONDS,
    maxSpeechesPerUnit: vars.MAX_SPEECHES_PER_UNIT,
    profile: loadTopicProfile(vars.TOPIC_PROFILE_PATH),
  };
}

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const FilterArgsSchema = z
  .object({
    from: IsoDate.optional(),
    to: IsoDate.optional(),
    limit: z.coerce.number().int().positive().optional(),
  })
  .refine((args) => !args.from || !args.to || args.from <= args.to, {
    message: "--from must not be after --to",
    path: ["from"],
  });

/**
 * Unit filter from `--from=YYYY-MM-DD --to=YYYY-MM-DD --limit=N` style arguments
 */
export function parseFilterArgs(args: string[]): WorkUnitFilter {
  const valueOf = (name: string) => args.find((arg) => arg.startsWith(`--${name}=`))?.split("=")[1];

  const parsed = FilterArgsSchema.safeParse({
    from: valueOf("from"),
    to: valueOf("to"),
    limit: valueOf("limit"),
  });
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid arguments",
      parsed.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    fromDate: parsed.data.from,
    toDate: parsed.data.to,
    limit: parsed.data.limit,
  };
}

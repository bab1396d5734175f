/**
 * Oracle client: asks an LLM whether a debate relates to the target subject
 *
 * Talks to any OpenAI-compatible chat endpoint (Gemini by default).
 * Every failure mode resolves to an OracleResult; nothing here throws for
 * rate limits, bad replies or transport errors.
 */

import OpenAI from "openai";
import type { OracleConfig } from "../../config/classifier";
import type { OracleResult, TopicProfile, WorkUnit } from "../model";
import { logger as rootLogger } from "../logger";
import { calculateBackoffDelayMs, formatDelay, isTransientError, sleep as defaultSleep } from "../backoff";
import type { MinIntervalRateLimiter } from "../rate-limit";
import { parseOracleResponse } from "./oracle-response";

const logger = rootLogger.child("oracle");

export const PARSE_FAILURE_REASONING = "Failed to parse response";
export const RATE_LIMIT_FAILURE_REASONING = "Rate Limit Error after retries";

export interface OracleUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface OracleCompletion {
  text: string;
  usage?: OracleUsage;
}

/**
 * One raw call to the external model
 */
export interface OracleTransport {
  complete(prompt: string, options: { timeoutMs: number }): Promise<OracleCompletion>;
}

/**
 * Transport over the OpenAI SDK. SDK-level retries are off: the client's
 * backoff policy is the only retry layer.
 */
export function createOpenAITransport(config: Pick<OracleConfig, "apiKey" | "baseUrl" | "model">): OracleTransport {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
  });

  return {
    async complete(prompt, { timeoutMs }) {
      const response = await client.chat.completions.create(
        {
          model: config.model,
          messages: [{ role: "user", content: prompt }],
        },
        { timeout: timeoutMs }
      );

      return {
        text: response.choices[0]?.message?.content ?? "",
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
            }
          : undefined,
      };
    },
  };
}

export interface PromptLimits {
  maxPromptTerms: number;
  promptExcerptChars: number;
}

/**
 * Prompt for a single debate: heading, date, matched terms and a capped excerpt
 */
export function buildOraclePrompt(
  unit: WorkUnit,
  matchedTerms: string[],
  profile: TopicProfile,
  limits: PromptLimits
): string {
  const terms = matchedTerms.slice(0, limits.maxPromptTerms);
  const considerations = [...profile.considerations, "etc."].map((line) => `- ${line}`).join("\n");

  return `You are analyzing UK parliamentary House of Commons debates to determine if they relate to ${profile.subject}.

**Debate Information:**
- Topic: ${unit.title}
- Date: ${unit.date}
- Keywords found: ${terms.length > 0 ? terms.join(", ") : "None"}

**Speech excerpts (first ${unit.speechCount} speeches):**
${unit.sampleText.slice(0, limits.promptExcerptChars)}

**Task:**
Analyze whether this debate has a significant relation to ${profile.subject} (${profile.description}).

Consider:
${considerations}

**Response format (JSON):**
{
  "has_relation": true/false,
  "confidence": 0.0-1.0 (0 = no relation to ${profile.subject}, 1 = very likely relation to ${profile.subject}),
  "reasoning": "One sentence explanation"
}

Respond ONLY with the JSON object, no additional text.`;
}

export interface OracleClientOptions {
  transport: OracleTransport;
  profile: TopicProfile;
  config: Pick<OracleConfig, "timeoutMs" | "maxRetries" | "backoffBaseSeconds" | "maxPromptTerms" | "promptExcerptChars">;
  sleep?: (ms: number) => Promise<void>;
  /** Spaces every transport attempt, retries included */
  rateLimiter?: MinIntervalRateLimiter;
  minIntervalSeconds?: number;
}

function failure(reasoning: string): OracleResult {
  return { hasRelation: false, confidence: 0, reasoning, inputTokens: 0, outputTokens: 0 };
}

export class OracleClient {
  private readonly transport: OracleTransport;
  private readonly profile: TopicProfile;
  private readonly config: OracleClientOptions["config"];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly rateLimiter?: MinIntervalRateLimiter;
  private readonly minIntervalSeconds: number;

  constructor(options: OracleClientOptions) {
    this.transport = options.transport;
    this.profile = options.profile;
    this.config = options.config;
    this.sleep = options.sleep ?? defaultSleep;
    this.rateLimiter = options.rateLimiter;
    this.minIntervalSeconds = options.minIntervalSeconds ?? 0;
  }

  /**
   * Classify one unit. Rate-limit errors are retried with exponential backoff;
   * any other error ends the call with the error text as reasoning.
   */
  async classify(unit: WorkUnit, matchedTerms: string[]): Promise<OracleResult> {
    const prompt = buildOraclePrompt(unit, matchedTerms, this.profile, this.config);
    const { maxRetries, backoffBaseSeconds, timeoutMs } = this.config;

    for (let attempt = 0; ; attempt++) {
      await this.rateLimiter?.waitIfNeeded(this.minIntervalSeconds);
      try {
        const completion = await this.transport.complete(prompt, { timeoutMs });
        return this.toResult(completion);
      } catch (error) {
        if (!isTransientError(error)) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error(`Oracle call failed for ${unit.id}`, message);
          return failure(`API Error: ${message}`);
        }

        if (attempt >= maxRetries) {
          logger.error(`Rate limit not cleared after ${maxRetries} retries for ${unit.id}`);
          return failure(RATE_LIMIT_FAILURE_REASONING);
        }

        const delayMs = calculateBackoffDelayMs(attempt, backoffBaseSeconds);
        logger.warn(`Rate limit reached, retrying in ${formatDelay(delayMs)} (attempt ${attempt + 1}/${maxRetries})`, {
          unitId: unit.id,
        });
        await this.sleep(delayMs);
      }
    }
  }

  private toResult(completion: OracleCompletion): OracleResult {
    const inputTokens = completion.usage?.promptTokens ?? 0;
    const outputTokens = completion.usage?.completionTokens ?? 0;
    const verdict = parseOracleResponse(completion.text.trim());

    if (!verdict) {
      logger.warn("Could not parse oracle reply", { reply: completion.text.slice(0, 100) });
      return { hasRelation: false, confidence: 0, reasoning: PARSE_FAILURE_REASONING, inputTokens, outputTokens };
    }

    return { ...verdict, inputTokens, outputTokens };
  }
}

/**
 * Exponential backoff utilities for handling oracle rate limits
 */

import OpenAI from "openai";

const BACKOFF_MULTIPLIER = 2; // 2x exponential backoff
export const DEFAULT_BACKOFF_BASE_SECONDS = 6;

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt.
 * With the default base: 6s, 12s, 24s, 48s, 96s.
 */
export function calculateBackoffDelayMs(
  attempt: number,
  baseSeconds: number = DEFAULT_BACKOFF_BASE_SECONDS
): number {
  return baseSeconds * Math.pow(BACKOFF_MULTIPLIER, attempt) * 1000;
}

/**
 * Rate-limit and quota signals from the transport are worth retrying;
 * everything else is terminal for the current call.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.status === 429) {
    return true;
  }

  const message = error instanceof Error ? error.message : String(error);
  return message.includes("429") || message.toLowerCase().includes("quota");
}

/**
 * Human-readable delay, e.g. "6s", "2m", "1h"
 */
export function formatDelay(delayMs: number): string {
  if (delayMs < 60 * 1000) return `${Math.round(delayMs / 1000)}s`;
  if (delayMs < 60 * 60 * 1000) return `${Math.round(delayMs / (60 * 1000))}m`;
  return `${Math.round(delayMs / (60 * 60 * 1000))}h`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

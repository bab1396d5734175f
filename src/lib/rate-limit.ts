/**
 * Minimum-spacing throttle for oracle calls
 *
 * Guarantees only that two calls are at least `minIntervalSeconds` apart.
 * Calls are issued one at a time by the orchestrator, so no rolling window
 * or locking is needed.
 */

import { logger } from "./logger";
import { sleep as defaultSleep } from "./backoff";

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class MinIntervalRateLimiter {
  private lastCallAt: number | null = null;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Suspend until `minIntervalSeconds` have passed since the previous call,
   * then record this call. Returns the time waited in ms (0 on the first call).
   */
  async waitIfNeeded(minIntervalSeconds: number): Promise<number> {
    let waitedMs = 0;

    if (this.lastCallAt !== null) {
      const elapsedMs = this.now() - this.lastCallAt;
      const requiredMs = minIntervalSeconds * 1000;
      if (elapsedMs < requiredMs) {
        waitedMs = requiredMs - elapsedMs;
        logger.debug(`Rate limit: waiting ${(waitedMs / 1000).toFixed(1)}s`);
        await this.sleep(waitedMs);
      }
    }

    this.lastCallAt = this.now();
    return waitedMs;
  }

  /** Timestamp (ms) of the last recorded call, null before the first */
  get lastCall(): number | null {
    return this.lastCallAt;
  }
}

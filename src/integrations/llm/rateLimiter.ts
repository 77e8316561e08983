/**
 * Fixed-window rate limiting for inference calls, keyed by model.
 */

import { logger } from "../../logger";
import { RateLimitExceededError } from "./errors";
import { sleep as defaultSleep } from "./retry";

export interface RateLimiterOptions {
  maxCalls: number;
  periodMs: number;
  /** Longest acquire() waits for a reset; 0 rejects immediately. */
  maxWaitMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface Window {
  startedAt: number;
  count: number;
}

export class RateLimiter {
  private readonly windows = new Map<string, Window>();
  private readonly maxCalls: number;
  private readonly periodMs: number;
  private readonly maxWaitMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    if (options.maxCalls < 1) {
      throw new RangeError("maxCalls must be at least 1");
    }
    if (options.periodMs <= 0) {
      throw new RangeError("periodMs must be positive");
    }
    this.maxCalls = options.maxCalls;
    this.periodMs = options.periodMs;
    this.maxWaitMs = options.maxWaitMs ?? 0;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * The live window for a key, or undefined once it has elapsed.
   */
  private current(key: string): Window | undefined {
    const window = this.windows.get(key);
    if (window && this.now() - window.startedAt >= this.periodMs) {
      this.windows.delete(key);
      return undefined;
    }
    return window;
  }

  /**
   * Drop every elapsed window, so keys seen once do not linger.
   */
  private sweep(): void {
    const now = this.now();
    for (const [key, window] of this.windows) {
      if (now - window.startedAt >= this.periodMs) {
        this.windows.delete(key);
      }
    }
  }

  /**
   * Number of keys with an open window.
   */
  get size(): number {
    return this.windows.size;
  }

  /**
   * Admit a call if the key's budget allows it.
   */
  tryAcquire(key = "default"): boolean {
    this.sweep();
    const window = this.current(key);
    if (!window) {
      this.windows.set(key, { startedAt: this.now(), count: 1 });
      return true;
    }
    if (window.count < this.maxCalls) {
      window.count++;
      return true;
    }
    return false;
  }

  /**
   * Calls left in the key's current window.
   */
  remaining(key = "default"): number {
    const window = this.current(key);
    return window ? this.maxCalls - window.count : this.maxCalls;
  }

  /**
   * Milliseconds until the key's window resets (0 when no window is open).
   */
  msUntilReset(key = "default"): number {
    const window = this.current(key);
    return window ? Math.max(0, window.startedAt + this.periodMs - this.now()) : 0;
  }

  /**
   * Wait for the key's budget, rejecting when the wait would exceed maxWaitMs.
   */
  async acquire(key = "default"): Promise<void> {
    let waited = 0;
    while (!this.tryAcquire(key)) {
      const delay = this.msUntilReset(key);
      if (waited + delay > this.maxWaitMs) {
        logger.warn("[RateLimit] Budget exhausted", { key, retryAfterMs: delay });
        throw new RateLimitExceededError(delay);
      }
      logger.debug("[RateLimit] Waiting for window reset", { key, delayMs: delay });
      await this.sleep(delay);
      waited += delay;
    }
  }

  reset(): void {
    this.windows.clear();
  }
}

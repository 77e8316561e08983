/**
 * Retry logic with exponential backoff.
 */

import { logger, errorMessage } from "../../logger";
import { AnalysisError } from "./errors";
import { MAX_ATTEMPTS, BASE_DELAY_MS, JITTER_MS } from "./types";

export interface RetryOptions {
  /** Total calls, including the first. */
  maxAttempts?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Check if an error is likely transient and worth retrying.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof AnalysisError) {
    return error.transient;
  }
  // Plain errors come from InferenceClient implementations that do not map
  // their failures onto AnalysisError; classify them by message.
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    // Network errors, timeouts, rate limits, and server errors
    return (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("timed out") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket") ||
      message.includes("rate limit") ||
      message.includes("429") ||
      message.includes("500") ||
      message.includes("502") ||
      message.includes("503") ||
      message.includes("504")
    );
  }
  return false;
}

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt - 1) plus jitter.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, jitterMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * jitterMs;
}

/**
 * Execute a function with retry logic and exponential backoff.
 * Non-transient errors are rethrown at once; after the last attempt the
 * last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? MAX_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  const jitterMs = options.jitterMs ?? JITTER_MS;
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isTransientError(error)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.error(`[LLM] All ${maxAttempts} attempts failed, giving up`, { error: errorMessage(error) });
        throw error;
      }

      const delay = backoffDelay(attempt, baseDelayMs, jitterMs);
      logger.warn(`[LLM] Transient error (attempt ${attempt}/${maxAttempts}), retrying in ${Math.round(delay)}ms`, {
        error: errorMessage(error),
      });
      await wait(delay);
    }
  }

  throw lastError;
}

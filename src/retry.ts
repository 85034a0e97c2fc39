import type { Logger } from "pino";
import { RetryableError, errorMessage } from "./errors.js";
import { logger as rootLogger } from "./logger.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 60000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the attempt following `attempt` (1-based): exponential,
 * stretched to the server's retry-after hint, never above `maxDelayMs`.
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterMs?: number
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(Math.max(exponential, retryAfterMs ?? 0), policy.maxDelayMs);
}

// Only RetryableError is retried; anything else is rethrown at once.
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  context: string,
  log: Logger = rootLogger
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof RetryableError) || attempt >= maxAttempts) {
        throw error;
      }

      const delay = backoffDelay(policy, attempt, error.retryAfterMs);
      log.warn(
        { context, attempt, maxAttempts, delayMs: delay, err: errorMessage(error) },
        "Retrying after transient failure"
      );
      await sleep(delay);
    }
  }
}

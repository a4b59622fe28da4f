// packages/shared/src/resilience/externalServiceResilience.ts

import { setTimeout as sleep } from "node:timers/promises";

import { logger } from "../logging/logger";

/**
 * Retry helper for wrapping calls to external services (upload APIs, CLIs).
 */
export interface WithRetryOptions {
  /**
   * Maximum number of attempts, including the first try.
   * Default: 3
   */
  maxAttempts?: number;

  /**
   * Base delay in milliseconds between attempts.
   * Default: 200 ms
   */
  baseDelayMs?: number;

  /**
   * Upper bound for a single delay.
   * Default: 10 s
   */
  maxDelayMs?: number;

  /**
   * Decides if an error is retryable. Without it every error is retried.
   */
  retryableError?: (error: unknown) => boolean;
}

/**
 * Execute an async operation with retry and exponential backoff.
 *
 * Example:
 *   await withRetry("youtube.uploadShort", () => client.upload(params), {
 *     maxAttempts: 3,
 *     retryableError: (err) => err instanceof YouTubeApiError && err.retryable,
 *   });
 */
export async function withRetry<T>(
  operationName: string,
  operation: (attemptNumber: number) => Promise<T>,
  options: WithRetryOptions = {},
): Promise<T> {
  const { maxAttempts = 3, baseDelayMs = 200, maxDelayMs = 10_000, retryableError } = options;

  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (retryableError && !retryableError(err)) {
        throw err;
      }

      if (attempt >= maxAttempts) {
        throw err;
      }

      const delayMs = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      logger.warn("external_call_retry", {
        service: "shared",
        operation: operationName,
        attempt,
        delayMs,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs);
      attempt += 1;
    }
  }
}

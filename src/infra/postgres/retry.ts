import { config } from "../../config";
import { pgErrorCode } from "../../common/errors";
import type { Logger } from "../../common/logger";

export type RetryOptions = {
  maxRetries?: number;
  baseDelayMs?: number;
  logger?: Logger;
};

export function isRetryablePgError(error: unknown): boolean {
  const code = pgErrorCode(error);
  return code === "40001" || // serialization_failure
         code === "40P01" || // deadlock_detected
         code === "55P03" || // lock_not_available
         code === "57P03";   // cannot_connect_now
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation`, retrying transient postgres failures with exponential
 * backoff plus jitter. Total attempts = 1 + maxRetries.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  context: string,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? config.RETRY_MAX_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? config.RETRY_BASE_DELAY_MS;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryablePgError(error)) {
        throw error;
      }
      options.logger?.warn(
        { attempt: attempt + 1, maxRetries, err: error },
        `Retrying ${context}`
      );
      const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
      const jitter = Math.random() * baseDelayMs;
      await delay(exponentialDelay + jitter);
    }
  }
}

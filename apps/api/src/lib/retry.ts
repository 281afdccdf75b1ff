import { ProviderError } from "./errors";
import type { Logger } from "./logger";

export interface RetryOptions {
  /** Retries after the first attempt. */
  retries: number;
  /** Wait before retrying a rate-limited call, unless the provider names one. */
  rateLimitBackoffMs: number;
  label: string;
  logger: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `operation`, retrying at most `retries` times on retryable provider
 * failures. Rate-limited calls wait before the retry; other transient
 * failures retry immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, rateLimitBackoffMs, label, logger } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const retryable = !(error instanceof ProviderError) || error.isRetryable();
      if (!retryable || attempt >= retries) {
        throw error;
      }

      const delayMs =
        error instanceof ProviderError && error.isRateLimited()
          ? error.retryAfterMs ?? rateLimitBackoffMs
          : 0;

      logger.warn({ err: error, attempt: attempt + 1, delayMs }, `${label} failed, retrying`);
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}

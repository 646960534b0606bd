import { HttpStatusError, NetworkError, RequestTimeoutError } from '../types/error.js';
import type { RetryPolicy } from '../types/config.js';

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Transient transport failures. Policy rejections and aborts never qualify.
 */
export function isRetryableNetError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.retryable;
  }
  return error instanceof NetworkError || error instanceof RequestTimeoutError;
}

function retryAfterOf(error: unknown): number | null {
  return error instanceof HttpStatusError ? error.retryAfter : null;
}

/**
 * Retries a single operation with exponential backoff.
 *
 * Wrap one atomic operation per call. A function that performs several
 * side-effecting steps may not be safe to re-run from the top.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, onRetry, shouldRetry = isRetryableNetError } = options;
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = policy;

  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      let delayMs = calculateBackoff(attempt, initialDelayMs, maxDelayMs, backoffMultiplier);

      const retryAfter = retryAfterOf(error);
      if (retryAfter !== null) {
        if (retryAfter > maxDelayMs) {
          // Server asked for a longer pause than we are willing to wait
          throw error;
        }
        delayMs = retryAfter;
      }

      // Jitter: 0-25% of delay
      const jitter = Math.random() * 0.25 * delayMs;
      const finalDelayMs = delayMs + jitter;

      if (onRetry) {
        onRetry(error, attempt + 1, finalDelayMs);
      }

      await new Promise((resolve) => {
        setTimeout(resolve, finalDelayMs);
      });

      attempt += 1;
    }
  }
}

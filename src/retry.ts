/**
 * Retry with exponential backoff for client reads.
 * @module retry
 */

import { TodoError } from "./errors.js";

/**
 * Options for retry behavior.
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds (default: 200) */
  initialDelayMs: number;
  /** Upper bound for any delay in milliseconds (default: 2000) */
  maxDelayMs: number;
  /** Exponential backoff multiplier (default: 2) */
  backoffMultiplier: number;
  /** Add up to 50% random jitter (default: true) */
  jitter: boolean;
  /** Called before each retry */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
  jitter: true,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Only TodoErrors flagged retryable (network failures, 5xx) are retried.
 * @internal
 */
function isRetryable(error: Error): boolean {
  return TodoError.isTodoError(error) && error.isRetryable;
}

/**
 * Delay before the retry that follows `attempt`.
 * @internal
 */
export function calculateDelay(attempt: number, opts: RetryOptions): number {
  const exponential =
    opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1);
  const capped = Math.min(exponential, opts.maxDelayMs);

  if (opts.jitter) {
    return Math.floor(capped + Math.random() * capped * 0.5);
  }
  return capped;
}

/**
 * Run `fn`, retrying retryable failures with exponential backoff.
 *
 * @throws The last error once attempts run out, or the first
 *         non-retryable error
 *
 * @example
 * ```typescript
 * const todos = await withRetry(() => client.list(), { maxAttempts: 5 });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(lastError) || attempt >= opts.maxAttempts) {
        throw lastError;
      }

      const delay = calculateDelay(attempt, opts);
      opts.onRetry?.(lastError, attempt, delay);
      await sleep(delay);
    }
  }
}

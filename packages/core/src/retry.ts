import type { Logger } from "./logger";
import { toError } from "./errors";

// Retry strategy for external calls
export interface RetryPolicy {
  // Total attempts including the first one
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  isRetryable?: (error: Error) => boolean;
}

export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalDurationMs: number }
  | { success: false; error: Error; attempts: number; totalDurationMs: number };

// One attempt: external calls are not retried unless configured
export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 1,
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

const RETRYABLE_ERROR_PATTERNS = [
  /rate.?limit/i,
  /too.?many.?requests/i,
  /timed? ?out/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /temporarily.?unavailable/i,
  /service.?unavailable/i,
  /internal.?server.?error/i,
  /\b50[234]\b/,
  /\b429\b/,
];

export function isRetryableError(error: Error): boolean {
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
}

// Exponential backoff with +-10% jitter
export function calculateDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  const jitter = delay * 0.1 * (random() * 2 - 1);
  return Math.max(0, Math.min(delay + jitter, policy.maxDelayMs));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = NO_RETRY,
  logger?: Logger,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const startTime = Date.now();
  let lastError: Error = new Error("No attempt was made");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);
      return {
        success: true,
        result,
        attempts: attempt,
        totalDurationMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = toError(error);
      const retryable = policy.isRetryable
        ? policy.isRetryable(lastError)
        : isRetryableError(lastError);

      if (!retryable || attempt >= maxAttempts) {
        if (maxAttempts > 1) {
          logger?.error(`Failed after ${attempt} attempts: ${lastError.message}`);
        }
        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalDurationMs: Date.now() - startTime,
        };
      }

      const delay = calculateDelay(attempt, policy);
      logger?.retry(attempt, maxAttempts, lastError.message);
      await wait(delay);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: maxAttempts,
    totalDurationMs: Date.now() - startTime,
  };
}

// Unwraps a RetryResult, rethrowing the last error
export async function retryOrThrow<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = NO_RETRY,
  logger?: Logger,
  wait?: (ms: number) => Promise<void>,
): Promise<T> {
  const outcome = await withRetry(fn, policy, logger, wait);
  if (outcome.success) {
    return outcome.result;
  }
  throw outcome.error;
}

import { ConfigurationError } from "@/lib/errors";

import { type BackoffConfig, type FailureClass, calculateBackoffMs, classifyError } from "./backoff";

export type FailureKind = FailureClass | "BREAKER_OPEN" | "RATE_LIMITED";

export interface RetryContext {
  /** Attempt that just finished, 1-indexed */
  attempt: number;
  maxAttempts: number;
  lastError: FailureKind;
}

export interface RetryConfig extends BackoffConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Source of uniform values in [0, 1) for jitter */
  random?: () => number;
}

export interface RetryOrchestrator {
  readonly maxAttempts: number;
  classify: (error: unknown) => FailureClass;
  shouldRetry: (context: RetryContext) => boolean;
  /** Delay before the attempt after `attempt`; honours a 429's Retry-After */
  backoffDelay: (attempt: number, error?: unknown) => number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

const getRetryAfterMs = (error: unknown): number | undefined => {
  if (
    error !== null &&
    typeof error === "object" &&
    "retryAfterMs" in error &&
    typeof error.retryAfterMs === "number"
  ) {
    return error.retryAfterMs;
  }
  return undefined;
};

/**
 * Creates the retry policy used by the request executor.
 *
 * Only RETRYABLE failures are retried. BREAKER_OPEN and RATE_LIMITED are
 * terminal here; requeueing them is the caller's decision.
 */
export const createRetryOrchestrator = (
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
): RetryOrchestrator => {
  const { maxAttempts, baseDelayMs, maxDelayMs, random = Math.random } = config;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ConfigurationError(
      `maxAttempts must be a positive integer, got ${maxAttempts}`,
      "maxAttempts",
    );
  }
  if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
    throw new ConfigurationError(
      `baseDelayMs must be a non-negative number, got ${baseDelayMs}`,
      "baseDelayMs",
    );
  }
  if (!Number.isFinite(maxDelayMs) || maxDelayMs < baseDelayMs) {
    throw new ConfigurationError(
      `maxDelayMs must be at least baseDelayMs (${baseDelayMs}), got ${maxDelayMs}`,
      "maxDelayMs",
    );
  }

  const shouldRetry = (context: RetryContext): boolean =>
    context.lastError === "RETRYABLE" && context.attempt < context.maxAttempts;

  const backoffDelay = (attempt: number, error?: unknown): number => {
    const retryAfterMs = getRetryAfterMs(error);
    if (retryAfterMs !== undefined) {
      return Math.min(retryAfterMs, maxDelayMs);
    }
    return calculateBackoffMs(attempt, { baseDelayMs, maxDelayMs }, random);
  };

  return {
    maxAttempts,
    classify: classifyError,
    shouldRetry,
    backoffDelay,
  };
};

/**
 * Request executor combining rate limiting, circuit breaker, timeouts and
 * retry logic around one logical request.
 *
 * Order of operations, repeated for every attempt:
 * 1. Observe cancellation
 * 2. Take a token from the rate limiter (denied -> RATE_LIMITED)
 * 3. Ask the circuit breaker (open -> BREAKER_OPEN)
 * 4. Call the transport under a timeout
 * 5. Report the outcome to the breaker, then classify and back off or stop
 *
 * Nothing here throws: every way a request can end is a `RequestOutcome`.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";

import { type Clock, systemClock } from "@/lib/clock";
import { ConfigurationError, RequestTimeoutError } from "@/lib/errors";
import { type Logger, silentLogger } from "@/lib/logger";
import type { MetricsSink } from "@/lib/metrics";

import type { CircuitBreaker } from "./circuit-breaker";
import {
  type FailureOutcome,
  type FailureReason,
  type RequestOutcome,
  type SuccessOutcome,
  describeOutcome,
} from "./outcome";
import type { RetryOrchestrator } from "./retry";
import type { TokenBucket } from "./token-bucket";

export interface RequestExecutorConfig {
  limiter: TokenBucket;
  breaker: CircuitBreaker;
  retry: RetryOrchestrator;
  /** Per-attempt transport timeout (default: 30s) */
  timeoutMs?: number;
  /**
   * How long an attempt may wait for a rate limiter token. 0 never waits,
   * Infinity waits as long as it takes (default: 0).
   */
  rateLimitWaitMs?: number;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsSink;
}

export interface ExecuteOptions {
  /** Abandons the request (CANCELLED) once aborted */
  signal?: AbortSignal;
  /** Identifies the request in logs */
  label?: string;
  /** Per-attempt timeout override (ms) */
  timeoutMs?: number;
}

export type Send<T> = (signal: AbortSignal) => Promise<T>;

export interface RequestExecutor {
  execute: <T>(send: Send<T>, options?: ExecuteOptions) => Promise<RequestOutcome<T>>;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates a request executor.
 *
 * The limiter and breaker are shared with every other executor and worker
 * that targets the same endpoint; the executor only touches them through
 * their synchronous methods and never holds anything across an await.
 *
 * @example
 * ```typescript
 * const executor = createRequestExecutor({
 *   limiter: createTokenBucket({ ratePerSecond: 5, burstCapacity: 10 }),
 *   breaker: createCircuitBreaker(),
 *   retry: createRetryOrchestrator(),
 * });
 *
 * const outcome = await executor.execute((signal) => transport.send(request, signal));
 * if (outcome.succeeded) {
 *   console.log(outcome.value);
 * }
 * ```
 */
export const createRequestExecutor = (config: RequestExecutorConfig): RequestExecutor => {
  const {
    limiter,
    breaker,
    retry,
    timeoutMs: defaultTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    rateLimitWaitMs = 0,
    clock = systemClock,
    logger = silentLogger,
    metrics,
  } = config;

  if (!Number.isFinite(defaultTimeoutMs) || defaultTimeoutMs <= 0) {
    throw new ConfigurationError(
      `timeoutMs must be a positive number, got ${defaultTimeoutMs}`,
      "timeoutMs",
    );
  }
  if (Number.isNaN(rateLimitWaitMs) || rateLimitWaitMs < 0) {
    throw new ConfigurationError(
      `rateLimitWaitMs must be non-negative, got ${rateLimitWaitMs}`,
      "rateLimitWaitMs",
    );
  }

  const admit = (signal: AbortSignal | undefined): Promise<boolean> | boolean => {
    if (rateLimitWaitMs === 0) {
      return limiter.tryAcquire();
    }
    return limiter.acquire({
      signal,
      maxWaitMs: Number.isFinite(rateLimitWaitMs) ? rateLimitWaitMs : undefined,
    });
  };

  const execute = async <T>(
    send: Send<T>,
    options: ExecuteOptions = {},
  ): Promise<RequestOutcome<T>> => {
    const { signal, label, timeoutMs = defaultTimeoutMs } = options;
    const timeoutPolicy = timeout(timeoutMs, TimeoutStrategy.Aggressive);
    const startedAt = clock.now();

    let attempt = 0;
    let retries = 0;
    let lastError: unknown;

    const finish = (outcome: RequestOutcome<T>): void => {
      metrics?.recordOutcome(outcome);
      const context = { label, attemptsUsed: outcome.attemptsUsed, latencyMs: outcome.totalLatencyMs };
      if (outcome.succeeded) {
        logger.debug(`Request ${describeOutcome(outcome)}`, context);
      } else {
        logger.warn(`Request ${describeOutcome(outcome)}`, {
          ...context,
          reason: outcome.reason,
          ...(outcome.error !== undefined && { error: errorMessage(outcome.error) }),
        });
      }
    };

    const fail = (reason: FailureReason, error: unknown = lastError): FailureOutcome => {
      const outcome: FailureOutcome = {
        succeeded: false,
        reason,
        attemptsUsed: attempt,
        retries,
        totalLatencyMs: clock.now() - startedAt,
      };
      if (error !== undefined) {
        outcome.error = error;
      }
      finish(outcome);
      return outcome;
    };

    for (;;) {
      if (signal?.aborted) {
        return fail("CANCELLED");
      }

      if (!(await admit(signal))) {
        return fail(signal?.aborted ? "CANCELLED" : "RATE_LIMITED");
      }

      if (!breaker.allow()) {
        return fail("BREAKER_OPEN");
      }

      attempt++;

      try {
        const value = await timeoutPolicy.execute(
          ({ signal: attemptSignal }) => send(attemptSignal),
          signal,
        );
        breaker.recordSuccess();

        if (attempt > 1) {
          logger.info("Request succeeded after retry", { label, attempt });
        }

        const outcome: SuccessOutcome<T> = {
          succeeded: true,
          reason: "SUCCESS",
          value,
          attemptsUsed: attempt,
          retries,
          totalLatencyMs: clock.now() - startedAt,
        };
        finish(outcome);
        return outcome;
      } catch (caught) {
        // An abandoned attempt says nothing about the endpoint's health
        if (signal?.aborted) {
          return fail("CANCELLED", caught);
        }

        const error =
          caught instanceof TaskCancelledError ? new RequestTimeoutError(timeoutMs) : caught;

        breaker.recordFailure();
        lastError = error;

        const failureClass = retry.classify(error);
        if (failureClass === "FATAL") {
          return fail("FATAL_CLIENT_ERROR", error);
        }

        if (!retry.shouldRetry({ attempt, maxAttempts: retry.maxAttempts, lastError: failureClass })) {
          return fail("MAX_RETRIES_EXCEEDED", error);
        }

        const backoffMs = retry.backoffDelay(attempt, error);
        retries++;
        metrics?.recordRetry();
        logger.debug("Retrying request", {
          label,
          attempt,
          maxAttempts: retry.maxAttempts,
          backoffMs,
          error: errorMessage(error),
        });

        await clock.sleep(backoffMs, signal);
      }
    }
  };

  return { execute };
};

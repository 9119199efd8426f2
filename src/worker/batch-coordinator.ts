/**
 * Batch coordinator: runs many logical requests through a bounded worker pool.
 *
 * Workers share whatever limiter and breaker the `process` callback's executor
 * holds. The coordinator never retries and never stops the batch because one
 * item failed; every item ends with exactly one outcome, in input order.
 */

import PQueue from "p-queue";

import { type RiskDistribution, type RiskThresholds, summarizeRisk } from "@/domains/risk";
import { type Clock, systemClock } from "@/lib/clock";
import { ConfigurationError } from "@/lib/errors";
import { type Logger, silentLogger, toError } from "@/lib/logger";
import type { MetricsSink } from "@/lib/metrics";
import type { FailureOutcome, RequestOutcome } from "@/lib/resilience";

const DEFAULT_BATCH_CONCURRENCY = 5;

export interface BatchOptions<TItem, TValue> {
  /** Runs one item, normally through a request executor */
  process: (item: TItem, signal: AbortSignal | undefined) => Promise<RequestOutcome<TValue>>;
  /** Worker count (default: 5) */
  concurrency?: number;
  /** Items not yet started when this aborts end as CANCELLED */
  signal?: AbortSignal;
  /** Deepfake score of a successful value, for the risk distribution */
  score?: (value: TValue) => number | undefined;
  riskThresholds?: RiskThresholds;
  /** Sink the executor reports to; cancelled items that never started are added here */
  metrics?: MetricsSink;
  clock?: Clock;
  logger?: Logger;
}

export interface BatchItemResult<TItem, TValue> {
  item: TItem;
  outcome: RequestOutcome<TValue>;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  /** Fatal errors plus exhausted retries */
  failed: number;
  /** Items that scheduled at least one retry */
  retried: number;
  /** Retries across all items */
  retryCount: number;
  /** Items turned away by an open circuit breaker */
  breakerTrips: number;
  rateLimited: number;
  cancelled: number;
  /** Mean latency of successful items (ms) */
  avgLatencyMs: number;
  /** Breaker transitions into OPEN during the run; needs `metrics` */
  circuitOpenings: number;
  durationMs: number;
  risk: RiskDistribution;
}

export interface BatchResult<TItem, TValue> {
  results: BatchItemResult<TItem, TValue>[];
  summary: BatchSummary;
}

const cancelledOutcome = (): FailureOutcome => ({
  succeeded: false,
  reason: "CANCELLED",
  attemptsUsed: 0,
  retries: 0,
  totalLatencyMs: 0,
});

export const summarizeOutcomes = (
  outcomes: readonly RequestOutcome<unknown>[],
): Omit<BatchSummary, "circuitOpenings" | "durationMs" | "risk"> => {
  const summary = {
    total: outcomes.length,
    succeeded: 0,
    failed: 0,
    retried: 0,
    retryCount: 0,
    breakerTrips: 0,
    rateLimited: 0,
    cancelled: 0,
    avgLatencyMs: 0,
  };
  let successLatencyMs = 0;

  for (const outcome of outcomes) {
    if (outcome.retries > 0) {
      summary.retried++;
      summary.retryCount += outcome.retries;
    }

    switch (outcome.reason) {
      case "SUCCESS":
        summary.succeeded++;
        successLatencyMs += outcome.totalLatencyMs;
        break;
      case "FATAL_CLIENT_ERROR":
      case "MAX_RETRIES_EXCEEDED":
        summary.failed++;
        break;
      case "BREAKER_OPEN":
        summary.breakerTrips++;
        break;
      case "RATE_LIMITED":
        summary.rateLimited++;
        break;
      case "CANCELLED":
        summary.cancelled++;
        break;
    }
  }

  if (summary.succeeded > 0) {
    summary.avgLatencyMs = Math.round(successLatencyMs / summary.succeeded);
  }
  return summary;
};

/**
 * Process exit code for a finished batch: 1 when any item failed.
 */
export const batchExitCode = (summary: Pick<BatchSummary, "failed"> | undefined): number =>
  summary !== undefined && summary.failed > 0 ? 1 : 0;

/**
 * Processes `items` with at most `concurrency` in flight.
 *
 * @example
 * ```typescript
 * const { results, summary } = await runBatch(paths, {
 *   concurrency: 5,
 *   signal: controller.signal,
 *   process: async (path, signal) =>
 *     client.detectDeepfake(await loadAudioFile(path), {}, { signal }),
 *   score: (result) => result.score,
 * });
 * ```
 */
export const runBatch = async <TItem, TValue>(
  items: readonly TItem[],
  options: BatchOptions<TItem, TValue>,
): Promise<BatchResult<TItem, TValue>> => {
  const {
    process,
    concurrency = DEFAULT_BATCH_CONCURRENCY,
    signal,
    score,
    riskThresholds,
    metrics,
    clock = systemClock,
    logger = silentLogger,
  } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(
      `concurrency must be a positive integer, got ${concurrency}`,
      "concurrency",
    );
  }

  const startedAt = clock.now();
  const openingsBefore = metrics?.snapshot().circuitOpenings ?? 0;
  const queue = new PQueue({ concurrency });
  const outcomes: RequestOutcome<TValue>[] = new Array(items.length);

  logger.info("Batch started", { total: items.length, concurrency });

  const runItem = async (item: TItem, index: number): Promise<void> => {
    if (signal?.aborted) {
      const outcome = cancelledOutcome();
      metrics?.recordOutcome(outcome);
      outcomes[index] = outcome;
      return;
    }

    try {
      outcomes[index] = await process(item, signal);
    } catch (error) {
      // Preparation failures (unreadable input and the like) never reach the transport
      logger.error("Batch item failed before any request", toError(error), { index });
      const outcome: FailureOutcome = {
        succeeded: false,
        reason: "FATAL_CLIENT_ERROR",
        attemptsUsed: 0,
        retries: 0,
        totalLatencyMs: 0,
        error,
      };
      metrics?.recordOutcome(outcome);
      outcomes[index] = outcome;
    }
  };

  await Promise.all(items.map((item, index) => queue.add(() => runItem(item, index))));

  const results = items.map((item, index) => ({ item, outcome: outcomes[index] }));
  const scores: number[] = [];
  if (score) {
    for (const { outcome } of results) {
      const value = outcome.succeeded ? score(outcome.value) : undefined;
      if (value !== undefined) {
        scores.push(value);
      }
    }
  }

  const summary: BatchSummary = {
    ...summarizeOutcomes(outcomes),
    circuitOpenings: (metrics?.snapshot().circuitOpenings ?? 0) - openingsBefore,
    durationMs: clock.now() - startedAt,
    risk: summarizeRisk(scores, riskThresholds),
  };

  logger.info("Batch finished", { ...summary });

  return { results, summary };
};

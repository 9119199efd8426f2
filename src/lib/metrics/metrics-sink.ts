import type { RequestOutcome } from "@/lib/resilience/outcome";

export interface MetricsSnapshot {
  filesProcessed: number;
  filesSucceeded: number;
  filesFailed: number;
  retryCount: number;
  breakerTrips: number;
  rateLimited: number;
  cancelled: number;
  circuitOpenings: number;
  avgLatencyMs: number;
}

export interface MetricsSink {
  recordOutcome: (outcome: RequestOutcome<unknown>) => void;
  recordRetry: () => void;
  recordCircuitOpening: () => void;
  snapshot: () => MetricsSnapshot;
  reset: () => void;
}

interface Counters {
  filesProcessed: number;
  filesSucceeded: number;
  filesFailed: number;
  retryCount: number;
  breakerTrips: number;
  rateLimited: number;
  cancelled: number;
  circuitOpenings: number;
  successLatencyTotalMs: number;
}

const emptyCounters = (): Counters => ({
  filesProcessed: 0,
  filesSucceeded: 0,
  filesFailed: 0,
  retryCount: 0,
  breakerTrips: 0,
  rateLimited: 0,
  cancelled: 0,
  circuitOpenings: 0,
  successLatencyTotalMs: 0,
});

/**
 * Pull-based counters for the monitoring endpoints. Updates are synchronous,
 * so concurrent workers never interleave inside one increment.
 */
export const createMetricsSink = (): MetricsSink => {
  let counters = emptyCounters();

  const recordOutcome = (outcome: RequestOutcome<unknown>): void => {
    counters.filesProcessed++;

    switch (outcome.reason) {
      case "SUCCESS":
        counters.filesSucceeded++;
        counters.successLatencyTotalMs += outcome.totalLatencyMs;
        break;
      case "MAX_RETRIES_EXCEEDED":
      case "FATAL_CLIENT_ERROR":
        counters.filesFailed++;
        break;
      case "BREAKER_OPEN":
        counters.breakerTrips++;
        break;
      case "RATE_LIMITED":
        counters.rateLimited++;
        break;
      case "CANCELLED":
        counters.cancelled++;
        break;
    }
  };

  const snapshot = (): MetricsSnapshot => {
    const { successLatencyTotalMs, ...rest } = counters;
    return {
      ...rest,
      avgLatencyMs:
        counters.filesSucceeded > 0
          ? Math.round(successLatencyTotalMs / counters.filesSucceeded)
          : 0,
    };
  };

  return {
    recordOutcome,
    recordRetry: () => {
      counters.retryCount++;
    },
    recordCircuitOpening: () => {
      counters.circuitOpenings++;
    },
    snapshot,
    reset: () => {
      counters = emptyCounters();
    },
  };
};

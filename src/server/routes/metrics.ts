import { Hono } from "hono";

import type { MetricsSnapshot } from "@/lib/metrics";
import type { CircuitBreakerState } from "@/lib/resilience";
import type { BatchSummary } from "@/worker/batch-coordinator";

const PREFIX = "voice_guard";

const BREAKER_STATE_VALUE: Record<CircuitBreakerState, number> = {
  CLOSED: 0,
  HALF_OPEN: 1,
  OPEN: 2,
};

type MetricType = "counter" | "gauge";

/** name, type, help, value */
type MetricLine = [string, MetricType, string, number];

const renderMetric = ([name, type, help, value]: MetricLine): string =>
  [
    `# HELP ${PREFIX}_${name} ${help}`,
    `# TYPE ${PREFIX}_${name} ${type}`,
    `${PREFIX}_${name} ${value}`,
  ].join("\n");

/**
 * Renders the metrics snapshot in Prometheus text exposition format.
 */
export const renderPrometheus = (
  snapshot: MetricsSnapshot,
  circuitState: CircuitBreakerState,
  summary?: BatchSummary,
): string => {
  const lines: MetricLine[] = [
    ["files_processed_total", "counter", "Total number of files processed", snapshot.filesProcessed],
    [
      "files_succeeded_total",
      "counter",
      "Total number of successfully processed files",
      snapshot.filesSucceeded,
    ],
    [
      "files_failed_total",
      "counter",
      "Files that failed fatally or exhausted retries",
      snapshot.filesFailed,
    ],
    ["retries_total", "counter", "Total number of retries", snapshot.retryCount],
    [
      "breaker_rejections_total",
      "counter",
      "Requests rejected by an open circuit breaker",
      snapshot.breakerTrips,
    ],
    ["rate_limited_total", "counter", "Requests rejected by the rate limiter", snapshot.rateLimited],
    ["cancelled_total", "counter", "Requests abandoned on cancellation", snapshot.cancelled],
    [
      "circuit_openings_total",
      "counter",
      "Circuit breaker transitions into OPEN",
      snapshot.circuitOpenings,
    ],
    [
      "avg_latency_ms",
      "gauge",
      "Average latency of successful requests in milliseconds",
      snapshot.avgLatencyMs,
    ],
    [
      "circuit_breaker_state",
      "gauge",
      "Circuit breaker state (0 closed, 1 half-open, 2 open)",
      BREAKER_STATE_VALUE[circuitState],
    ],
  ];

  if (summary) {
    lines.push(
      ["avg_score", "gauge", "Average deepfake score of the last batch", summary.risk.averageScore],
      ["high_risk_count", "gauge", "High-risk files in the last batch", summary.risk.high],
    );
  }

  return `${lines.map(renderMetric).join("\n\n")}\n`;
};

export interface MetricsRouteDeps {
  getSnapshot: () => MetricsSnapshot;
  getCircuitState: () => CircuitBreakerState;
  getBatchSummary?: () => BatchSummary | undefined;
}

export const createMetricsRoute = (deps: MetricsRouteDeps): Hono => {
  const metrics = new Hono();

  metrics.get("/", (c) =>
    c.text(
      renderPrometheus(deps.getSnapshot(), deps.getCircuitState(), deps.getBatchSummary?.()),
      200,
      { "Content-Type": "text/plain; version=0.0.4" },
    ),
  );

  return metrics;
};

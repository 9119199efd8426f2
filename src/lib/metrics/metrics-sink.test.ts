import { describe, expect, it } from "vitest";

import { createMetricsSink } from "./metrics-sink";

describe("createMetricsSink", () => {
  it("should start empty", () => {
    expect(createMetricsSink().snapshot()).toEqual({
      filesProcessed: 0,
      filesSucceeded: 0,
      filesFailed: 0,
      retryCount: 0,
      breakerTrips: 0,
      rateLimited: 0,
      cancelled: 0,
      circuitOpenings: 0,
      avgLatencyMs: 0,
    });
  });

  it("should count each terminal reason in its own bucket", () => {
    const sink = createMetricsSink();

    sink.recordOutcome({ succeeded: true, reason: "SUCCESS", value: 1, attemptsUsed: 1, retries: 0, totalLatencyMs: 100 });
    sink.recordOutcome({ succeeded: true, reason: "SUCCESS", value: 2, attemptsUsed: 2, retries: 1, totalLatencyMs: 251 });
    sink.recordOutcome({ succeeded: false, reason: "FATAL_CLIENT_ERROR", attemptsUsed: 1, retries: 0, totalLatencyMs: 5 });
    sink.recordOutcome({ succeeded: false, reason: "MAX_RETRIES_EXCEEDED", attemptsUsed: 3, retries: 2, totalLatencyMs: 5 });
    sink.recordOutcome({ succeeded: false, reason: "BREAKER_OPEN", attemptsUsed: 0, retries: 0, totalLatencyMs: 0 });
    sink.recordOutcome({ succeeded: false, reason: "RATE_LIMITED", attemptsUsed: 0, retries: 0, totalLatencyMs: 0 });
    sink.recordOutcome({ succeeded: false, reason: "CANCELLED", attemptsUsed: 0, retries: 0, totalLatencyMs: 0 });
    sink.recordRetry();
    sink.recordRetry();
    sink.recordCircuitOpening();

    expect(sink.snapshot()).toEqual({
      filesProcessed: 7,
      filesSucceeded: 2,
      filesFailed: 2,
      retryCount: 2,
      breakerTrips: 1,
      rateLimited: 1,
      cancelled: 1,
      circuitOpenings: 1,
      avgLatencyMs: 176,
    });
  });

  it("should clear all counters on reset", () => {
    const sink = createMetricsSink();
    sink.recordRetry();
    sink.recordOutcome({ succeeded: false, reason: "RATE_LIMITED", attemptsUsed: 0, retries: 0, totalLatencyMs: 0 });

    sink.reset();

    expect(sink.snapshot().retryCount).toBe(0);
    expect(sink.snapshot().filesProcessed).toBe(0);
  });
});

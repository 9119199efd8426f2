import { describe, expect, it, vi } from "vitest";

import { type Logger, silentLogger } from "@/lib/logger";
import { createMetricsSink } from "@/lib/metrics";

import { createCircuitBreaker } from "./circuit-breaker";
import { monitorCircuitBreaker } from "./monitor";

const createSpyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: () => silentLogger,
});

describe("monitorCircuitBreaker", () => {
  it("should count openings and log each transition", () => {
    const breaker = createCircuitBreaker({
      failureThreshold: 1,
      successThreshold: 1,
      recoveryTimeoutMs: 0,
    });
    const logger = createSpyLogger();
    const metrics = createMetricsSink();

    monitorCircuitBreaker(breaker, { endpoint: "/v1/voice/deepfake", logger, metrics });

    breaker.recordFailure();
    expect(metrics.snapshot().circuitOpenings).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "Circuit breaker OPENED",
      expect.any(Error),
      { endpoint: "/v1/voice/deepfake", previous: "CLOSED" },
    );

    breaker.recordSuccess();
    expect(logger.info).toHaveBeenCalledWith("Circuit breaker HALF_OPEN, probing", {
      endpoint: "/v1/voice/deepfake",
    });
    expect(logger.info).toHaveBeenCalledWith("Circuit breaker CLOSED, resuming normal operation", {
      endpoint: "/v1/voice/deepfake",
      previous: "HALF_OPEN",
    });
  });

  it("should stop after unsubscribing", () => {
    const breaker = createCircuitBreaker({
      failureThreshold: 1,
      successThreshold: 1,
      recoveryTimeoutMs: 1000,
    });
    const metrics = createMetricsSink();

    const stop = monitorCircuitBreaker(breaker, {
      endpoint: "/v1/reports/sar",
      logger: silentLogger,
      metrics,
    });
    stop();
    breaker.recordFailure();

    expect(metrics.snapshot().circuitOpenings).toBe(0);
  });
});

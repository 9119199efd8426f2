import { describe, expect, it } from "vitest";

import { ConfigurationError } from "@/lib/errors";

import { createRetryOrchestrator } from "./retry";

describe("createRetryOrchestrator", () => {
  const config = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, random: () => 0.5 };

  describe("configuration", () => {
    it("should reject maxAttempts below 1", () => {
      expect(() => createRetryOrchestrator({ ...config, maxAttempts: 0 })).toThrow(
        ConfigurationError,
      );
    });

    it("should reject maxDelayMs below baseDelayMs", () => {
      expect(() => createRetryOrchestrator({ ...config, maxDelayMs: 50 })).toThrow(
        "maxDelayMs must be at least baseDelayMs (100), got 50",
      );
    });

    it("should reject a negative baseDelayMs", () => {
      expect(() => createRetryOrchestrator({ ...config, baseDelayMs: -1 })).toThrow(
        ConfigurationError,
      );
    });
  });

  describe("shouldRetry", () => {
    const retry = createRetryOrchestrator(config);

    it("should retry retryable failures while attempts remain", () => {
      expect(retry.shouldRetry({ attempt: 1, maxAttempts: 3, lastError: "RETRYABLE" })).toBe(true);
      expect(retry.shouldRetry({ attempt: 2, maxAttempts: 3, lastError: "RETRYABLE" })).toBe(true);
    });

    it("should stop at maxAttempts", () => {
      expect(retry.shouldRetry({ attempt: 3, maxAttempts: 3, lastError: "RETRYABLE" })).toBe(
        false,
      );
    });

    it.each(["FATAL", "BREAKER_OPEN", "RATE_LIMITED"] as const)("should never retry %s", (kind) => {
      expect(retry.shouldRetry({ attempt: 1, maxAttempts: 3, lastError: kind })).toBe(false);
    });
  });

  describe("backoffDelay", () => {
    const retry = createRetryOrchestrator(config);

    it("should apply jittered exponential backoff", () => {
      expect(retry.backoffDelay(1)).toBe(50);
      expect(retry.backoffDelay(2)).toBe(100);
      expect(retry.backoffDelay(5)).toBe(500);
    });

    it("should honour Retry-After up to maxDelayMs", () => {
      expect(retry.backoffDelay(1, { status: 429, retryAfterMs: 700 })).toBe(700);
      expect(retry.backoffDelay(1, { status: 429, retryAfterMs: 60_000 })).toBe(1000);
    });
  });

  it("should expose the classifier", () => {
    const retry = createRetryOrchestrator(config);

    expect(retry.maxAttempts).toBe(3);
    expect(retry.classify({ status: 500 })).toBe("RETRYABLE");
    expect(retry.classify({ status: 400 })).toBe("FATAL");
  });
});

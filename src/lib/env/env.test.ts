import * as v from "valibot";
import { describe, expect, it } from "vitest";

import { formatEnvIssues, parseEnv } from "./env";
import { envSchema } from "./schema";

describe("parseEnv", () => {
  const BASE_ENV = {
    VOICE_API_KEY: "test-key",
  };

  it("should apply defaults for everything but the API key", () => {
    const env = parseEnv(BASE_ENV);

    expect(env).toEqual({
      VOICE_API_KEY: "test-key",
      VOICE_API_URL: "http://localhost:8000",
      DEEPFAKE_PATH: "/v1/voice/deepfake",
      MFA_PATH: "/v1/mfa/voice/verify",
      SAR_PATH: "/v1/reports/sar",
      RATE_PER_SECOND: 10,
      BURST_CAPACITY: 10,
      MAX_RATE_LIMIT_WAIT_MS: 30000,
      FAILURE_THRESHOLD: 5,
      SUCCESS_THRESHOLD: 2,
      RECOVERY_TIMEOUT_MS: 60000,
      MAX_ATTEMPTS: 3,
      BASE_DELAY_MS: 1000,
      MAX_DELAY_MS: 30000,
      CONCURRENCY: 5,
      PER_REQUEST_TIMEOUT_MS: 30000,
      RISK_HIGH_THRESHOLD: 0.7,
      RISK_MEDIUM_THRESHOLD: 0.4,
      METRICS_PORT: 9090,
      NODE_ENV: "development",
    });
  });

  it("should parse explicit values", () => {
    const env = parseEnv({
      ...BASE_ENV,
      RATE_PER_SECOND: "2.5",
      BURST_CAPACITY: "4",
      CONCURRENCY: "20",
      SAR_PATH: "/v2/sar",
      NODE_ENV: "production",
      LOG_LEVEL: "warn",
    });

    expect(env.RATE_PER_SECOND).toBe(2.5);
    expect(env.BURST_CAPACITY).toBe(4);
    expect(env.CONCURRENCY).toBe(20);
    expect(env.SAR_PATH).toBe("/v2/sar");
    expect(env.NODE_ENV).toBe("production");
    expect(env.LOG_LEVEL).toBe("warn");
  });

  it("should fail when VOICE_API_KEY is missing", () => {
    expect(() => parseEnv({})).toThrow();
  });

  it("should fail when VOICE_API_KEY is empty", () => {
    expect(() => parseEnv({ VOICE_API_KEY: "" })).toThrow("VOICE_API_KEY is required");
  });

  it("should fail when RATE_PER_SECOND is zero", () => {
    expect(() => parseEnv({ ...BASE_ENV, RATE_PER_SECOND: "0" })).toThrow();
  });

  it("should fail when BURST_CAPACITY is below 1", () => {
    expect(() => parseEnv({ ...BASE_ENV, BURST_CAPACITY: "0" })).toThrow();
  });

  it("should fail when MAX_ATTEMPTS is not an integer", () => {
    expect(() => parseEnv({ ...BASE_ENV, MAX_ATTEMPTS: "2.5" })).toThrow();
  });

  it("should fail when the medium risk threshold exceeds the high one", () => {
    expect(() =>
      parseEnv({ ...BASE_ENV, RISK_HIGH_THRESHOLD: "0.3", RISK_MEDIUM_THRESHOLD: "0.6" }),
    ).toThrow("RISK_MEDIUM_THRESHOLD must not exceed RISK_HIGH_THRESHOLD");
  });

  it("should fail when a risk threshold is above 1", () => {
    expect(() => parseEnv({ ...BASE_ENV, RISK_HIGH_THRESHOLD: "1.5" })).toThrow();
  });

  it("should fail when CONCURRENCY is not a number", () => {
    expect(() => parseEnv({ ...BASE_ENV, CONCURRENCY: "many" })).toThrow();
  });

  it("should fail when METRICS_PORT is greater than 65535", () => {
    expect(() => parseEnv({ ...BASE_ENV, METRICS_PORT: "65536" })).toThrow();
  });

  it("should fail when an endpoint path is relative", () => {
    expect(() => parseEnv({ ...BASE_ENV, MFA_PATH: "v1/mfa" })).toThrow("Paths must start with /");
  });

  it("should fail when VOICE_API_URL is not a URL", () => {
    expect(() => parseEnv({ ...BASE_ENV, VOICE_API_URL: "not a url" })).toThrow();
  });

  it("should fail when LOG_LEVEL is invalid", () => {
    expect(() => parseEnv({ ...BASE_ENV, LOG_LEVEL: "verbose" })).toThrow();
  });
});

describe("formatEnvIssues", () => {
  it("should name the offending variable", () => {
    const result = v.safeParse(envSchema, { VOICE_API_KEY: "" });
    if (result.success) {
      throw new Error("expected validation to fail");
    }

    expect(formatEnvIssues(result.issues)).toEqual(["  - VOICE_API_KEY: VOICE_API_KEY is required"]);
  });

  it("should attach the threshold ordering issue to the medium threshold", () => {
    const result = v.safeParse(envSchema, {
      VOICE_API_KEY: "test-key",
      RISK_HIGH_THRESHOLD: "0.5",
      RISK_MEDIUM_THRESHOLD: "0.8",
    });
    if (result.success) {
      throw new Error("expected validation to fail");
    }

    expect(formatEnvIssues(result.issues)).toEqual([
      "  - RISK_MEDIUM_THRESHOLD: RISK_MEDIUM_THRESHOLD must not exceed RISK_HIGH_THRESHOLD",
    ]);
  });
});

import { describe, expect, it } from "vitest";

import { buildConfig } from "./config";
import { parseEnv } from "./env";

describe("buildConfig", () => {
  it("should map the environment onto component configs", () => {
    const config = buildConfig(
      parseEnv({
        VOICE_API_KEY: "test-key",
        VOICE_API_URL: "https://voice.example.test",
        FAILURE_THRESHOLD: "3",
        MAX_ATTEMPTS: "4",
        NODE_ENV: "production",
      }),
    );

    expect(config.api).toEqual({
      baseUrl: "https://voice.example.test",
      apiKey: "test-key",
      paths: {
        deepfake: "/v1/voice/deepfake",
        mfa: "/v1/mfa/voice/verify",
        sar: "/v1/reports/sar",
      },
    });
    expect(config.circuitBreaker).toEqual({
      failureThreshold: 3,
      successThreshold: 2,
      recoveryTimeoutMs: 60000,
    });
    expect(config.retry).toEqual({ maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000 });
    expect(config.logging).toEqual({ level: "info", format: "json" });
    expect(config.risk).toEqual({ highThreshold: 0.7, mediumThreshold: 0.4 });
  });

  it("should carry custom risk thresholds", () => {
    const config = buildConfig(
      parseEnv({
        VOICE_API_KEY: "test-key",
        RISK_HIGH_THRESHOLD: "0.9",
        RISK_MEDIUM_THRESHOLD: "0.1",
      }),
    );

    expect(config.risk).toEqual({ highThreshold: 0.9, mediumThreshold: 0.1 });
  });

  it("should log verbosely and readably in development", () => {
    const config = buildConfig(parseEnv({ VOICE_API_KEY: "test-key" }));

    expect(config.logging).toEqual({ level: "debug", format: "pretty" });
  });

  it("should honour an explicit LOG_LEVEL", () => {
    const config = buildConfig(parseEnv({ VOICE_API_KEY: "test-key", LOG_LEVEL: "error" }));

    expect(config.logging.level).toBe("error");
  });
});

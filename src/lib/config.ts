import type { VoiceApiPaths } from "@/adapters/voice-api";
import type { RiskThresholds } from "@/domains/risk";

import type { Env } from "./env";
import type { LogFormat, LogLevel } from "./logger";
import type { CircuitBreakerConfig, RetryConfig, TokenBucketConfig } from "./resilience";

export interface AppConfig {
  api: {
    baseUrl: string;
    apiKey: string;
    paths: VoiceApiPaths;
  };
  rateLimit: TokenBucketConfig;
  /** How long a request may wait for a rate limiter token (ms) */
  rateLimitWaitMs: number;
  circuitBreaker: CircuitBreakerConfig;
  retry: RetryConfig;
  timeoutMs: number;
  batch: {
    concurrency: number;
  };
  risk: RiskThresholds;
  server: {
    port: number;
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

export const buildConfig = (env: Env): AppConfig => ({
  api: {
    baseUrl: env.VOICE_API_URL,
    apiKey: env.VOICE_API_KEY,
    paths: {
      deepfake: env.DEEPFAKE_PATH,
      mfa: env.MFA_PATH,
      sar: env.SAR_PATH,
    },
  },
  rateLimit: {
    ratePerSecond: env.RATE_PER_SECOND,
    burstCapacity: env.BURST_CAPACITY,
  },
  rateLimitWaitMs: env.MAX_RATE_LIMIT_WAIT_MS,
  circuitBreaker: {
    failureThreshold: env.FAILURE_THRESHOLD,
    successThreshold: env.SUCCESS_THRESHOLD,
    recoveryTimeoutMs: env.RECOVERY_TIMEOUT_MS,
  },
  retry: {
    maxAttempts: env.MAX_ATTEMPTS,
    baseDelayMs: env.BASE_DELAY_MS,
    maxDelayMs: env.MAX_DELAY_MS,
  },
  timeoutMs: env.PER_REQUEST_TIMEOUT_MS,
  batch: {
    concurrency: env.CONCURRENCY,
  },
  risk: {
    highThreshold: env.RISK_HIGH_THRESHOLD,
    mediumThreshold: env.RISK_MEDIUM_THRESHOLD,
  },
  server: {
    port: env.METRICS_PORT,
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    format: env.NODE_ENV === "development" ? "pretty" : "json",
  },
});

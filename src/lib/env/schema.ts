import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

/** Integer env var with a lower bound and a default */
const integer = (min: number, fallback: string) =>
  v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(min)),
    fallback,
  );

/** Score threshold between 0 and 1 */
const threshold = (fallback: string) =>
  v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(0), v.maxValue(1)),
    fallback,
  );

const path = (fallback: string) =>
  v.optional(v.pipe(v.string(), v.startsWith("/", "Paths must start with /")), fallback);

export const envSchema = v.pipe(
  v.object({
    // Voice API
    VOICE_API_KEY: v.pipe(v.string(), v.minLength(1, "VOICE_API_KEY is required")),
    VOICE_API_URL: v.optional(v.pipe(v.string(), v.url()), "http://localhost:8000"),
    DEEPFAKE_PATH: path("/v1/voice/deepfake"),
    MFA_PATH: path("/v1/mfa/voice/verify"),
    SAR_PATH: path("/v1/reports/sar"),

    // Rate limiter
    RATE_PER_SECOND: v.optional(
      v.pipe(
        v.string(),
        v.transform(Number),
        v.number(),
        v.check((rate) => rate > 0, "RATE_PER_SECOND must be greater than 0"),
      ),
      "10",
    ),
    BURST_CAPACITY: integer(1, "10"),
    MAX_RATE_LIMIT_WAIT_MS: integer(0, "30000"),

    // Circuit breaker
    FAILURE_THRESHOLD: integer(1, "5"),
    SUCCESS_THRESHOLD: integer(1, "2"),
    RECOVERY_TIMEOUT_MS: integer(0, "60000"),

    // Retry
    MAX_ATTEMPTS: integer(1, "3"),
    BASE_DELAY_MS: integer(0, "1000"),
    MAX_DELAY_MS: integer(0, "30000"),

    // Batch
    CONCURRENCY: integer(1, "5"),
    PER_REQUEST_TIMEOUT_MS: integer(1, "30000"),

    // Risk bands
    RISK_HIGH_THRESHOLD: threshold("0.7"),
    RISK_MEDIUM_THRESHOLD: threshold("0.4"),

    // Server
    METRICS_PORT: v.optional(
      v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(1), v.maxValue(65535)),
      "9090",
    ),
    NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

    // Logging
    LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),
  }),
  v.forward(
    v.check(
      (env) => env.RISK_MEDIUM_THRESHOLD <= env.RISK_HIGH_THRESHOLD,
      "RISK_MEDIUM_THRESHOLD must not exceed RISK_HIGH_THRESHOLD",
    ),
    ["RISK_MEDIUM_THRESHOLD"],
  ),
);

export type Env = v.InferOutput<typeof envSchema>;

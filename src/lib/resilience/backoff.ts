/**
 * Exponential backoff and failure classification for retry logic.
 */

export interface BackoffConfig {
  /** Delay ceiling before jitter for the first retry (ms) */
  baseDelayMs: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/**
 * Calculates the backoff delay before retrying after `attempt` failed.
 *
 * Uses full jitter: the delay is drawn uniformly from
 * `[0, min(baseDelayMs * 2^(attempt - 1), maxDelayMs))`.
 *
 * @param attempt - The attempt that just failed (1-indexed)
 * @param random - Source of uniform values in [0, 1)
 *
 * @example
 * ```typescript
 * // After the first attempt: 0..1000ms
 * calculateBackoffMs(1);
 *
 * // After the third attempt: 0..4000ms
 * calculateBackoffMs(3);
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
  random: () => number = Math.random,
): number => {
  const { baseDelayMs, maxDelayMs } = config;
  const cappedDelayMs = Math.min(baseDelayMs * 2 ** Math.max(0, attempt - 1), maxDelayMs);

  return Math.floor(cappedDelayMs * random());
};

/**
 * Parses Retry-After header value.
 *
 * @param value - Header value (seconds as string, or HTTP date)
 * @returns Delay in milliseconds, or null if parsing fails
 *
 * @example
 * ```typescript
 * parseRetryAfterMs("30"); // 30000
 * parseRetryAfterMs("Wed, 21 Oct 2026 07:28:00 GMT"); // time until that date
 * ```
 */
export const parseRetryAfterMs = (value: string | null, now: number = Date.now()): number | null => {
  if (!value) {
    return null;
  }

  // Only accept if the entire string is a valid non-negative integer
  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const delayMs = date - now;
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
};

export type FailureClass = "RETRYABLE" | "FATAL";

/**
 * Network error codes that indicate transient failures.
 */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const RETRYABLE_KINDS = new Set(["timeout", "network"]);

const TIMEOUT_ERROR_NAMES = new Set(["TimeoutError", "TaskCancelledError"]);

/**
 * Checks if an HTTP status code is retryable: 429 and every 5xx.
 */
export const isRetryableStatusCode = (statusCode: number): boolean =>
  statusCode === 429 || (statusCode >= 500 && statusCode <= 599);

/**
 * Extracts HTTP status code from an error object without type casts.
 */
const getStatusCode = (err: object): number | undefined => {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
};

/**
 * Classifies a failed attempt.
 *
 * Retryable:
 * - 429 (rate limit)
 * - 5xx (server errors)
 * - Timeouts and transient network errors (ECONNRESET, ETIMEDOUT, etc.)
 *
 * Everything else is fatal, including 4xx responses, malformed bodies and
 * errors that carry no transport information.
 */
export const classifyError = (error: unknown): FailureClass => {
  if (error === null || typeof error !== "object") {
    return "FATAL";
  }

  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    return isRetryableStatusCode(statusCode) ? "RETRYABLE" : "FATAL";
  }

  if ("kind" in error && typeof error.kind === "string") {
    return RETRYABLE_KINDS.has(error.kind) ? "RETRYABLE" : "FATAL";
  }

  if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
    return "RETRYABLE";
  }

  if ("name" in error && typeof error.name === "string" && TIMEOUT_ERROR_NAMES.has(error.name)) {
    return "RETRYABLE";
  }

  return "FATAL";
};

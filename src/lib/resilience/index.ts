/**
 * Resilience middleware for outbound calls.
 */

// Token bucket
export {
  createTokenBucket,
  type AcquireOptions,
  type TokenBucket,
  type TokenBucketConfig,
} from "./token-bucket";

// Circuit breaker
export {
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerSnapshot,
  type CircuitBreakerState,
  type StateChangeListener,
} from "./circuit-breaker";
export { monitorCircuitBreaker, type CircuitBreakerMonitorOptions } from "./monitor";

// Backoff and retry
export {
  calculateBackoffMs,
  classifyError,
  DEFAULT_BACKOFF_CONFIG,
  isRetryableStatusCode,
  parseRetryAfterMs,
  type BackoffConfig,
  type FailureClass,
} from "./backoff";
export {
  createRetryOrchestrator,
  DEFAULT_RETRY_CONFIG,
  type FailureKind,
  type RetryConfig,
  type RetryContext,
  type RetryOrchestrator,
} from "./retry";

// Outcomes
export {
  describeOutcome,
  type FailureOutcome,
  type FailureReason,
  type RequestOutcome,
  type SuccessOutcome,
  type TerminalReason,
} from "./outcome";

// Request executor (main entry point)
export {
  createRequestExecutor,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type ExecuteOptions,
  type RequestExecutor,
  type RequestExecutorConfig,
  type Send,
} from "./request-executor";

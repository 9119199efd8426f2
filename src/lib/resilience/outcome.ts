export type TerminalReason =
  | "SUCCESS"
  | "MAX_RETRIES_EXCEEDED"
  | "FATAL_CLIENT_ERROR"
  | "BREAKER_OPEN"
  | "RATE_LIMITED"
  | "CANCELLED";

export type FailureReason = Exclude<TerminalReason, "SUCCESS">;

interface OutcomeBase {
  /** Transport calls made, including the last one */
  attemptsUsed: number;
  /** Backoffs scheduled, including one a later admission check turned away */
  retries: number;
  totalLatencyMs: number;
}

export interface SuccessOutcome<T> extends OutcomeBase {
  succeeded: true;
  reason: "SUCCESS";
  value: T;
}

export interface FailureOutcome extends OutcomeBase {
  succeeded: false;
  reason: FailureReason;
  /** Last transport error, absent when no attempt failed at the transport */
  error?: unknown;
}

export type RequestOutcome<T> = SuccessOutcome<T> | FailureOutcome;

/**
 * Human-readable description of an outcome, for logs and error messages.
 */
export const describeOutcome = (outcome: RequestOutcome<unknown>): string => {
  switch (outcome.reason) {
    case "SUCCESS":
      return `succeeded after ${outcome.attemptsUsed} attempt(s)`;
    case "MAX_RETRIES_EXCEEDED":
      return `failed after ${outcome.attemptsUsed} attempt(s), retries exhausted`;
    case "FATAL_CLIENT_ERROR":
      return `rejected by the server after ${outcome.attemptsUsed} attempt(s)`;
    case "BREAKER_OPEN":
      return "circuit breaker is open";
    case "RATE_LIMITED":
      return "rate limit exceeded";
    case "CANCELLED":
      return "cancelled";
  }
};

/**
 * Circuit breaker state machine.
 *
 * - CLOSED: Normal operation, calls pass through
 * - OPEN: After `failureThreshold` consecutive failures, calls are rejected
 * - HALF_OPEN: After `recoveryTimeoutMs`, calls pass as probes until
 *   `successThreshold` consecutive successes close the circuit
 *
 * The OPEN -> HALF_OPEN transition is evaluated lazily from timestamps, so the
 * breaker owns no timers.
 */

import { type Clock, systemClock } from "@/lib/clock";
import { ConfigurationError } from "@/lib/errors";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Number of consecutive successes in HALF_OPEN to close circuit */
  successThreshold: number;
  /** Time in ms before attempting HALF_OPEN from OPEN */
  recoveryTimeoutMs: number;
}

export interface CircuitBreakerSnapshot {
  state: CircuitBreakerState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  openedAt: number | null;
}

export type StateChangeListener = (state: CircuitBreakerState, previous: CircuitBreakerState) => void;

export interface CircuitBreaker {
  /** Whether a call may proceed now. Does not change state. */
  allow: () => boolean;
  recordSuccess: () => void;
  recordFailure: () => void;
  /** Effective state, including a recovery timeout that has elapsed but not been committed */
  getState: () => CircuitBreakerState;
  getSnapshot: () => CircuitBreakerSnapshot;
  /** Forces the circuit CLOSED */
  reset: () => void;
  /** Subscribe to committed state transitions */
  onStateChange: (listener: StateChangeListener) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  recoveryTimeoutMs: 60_000,
};

const assertPositiveInteger = (value: number, setting: string): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${setting} must be a positive integer, got ${value}`, setting);
  }
};

/**
 * Creates a circuit breaker.
 *
 * Callers check `allow()` before each attempt and report the attempt's outcome
 * exactly once with `recordSuccess()` or `recordFailure()`.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({
 *   failureThreshold: 5,
 *   successThreshold: 2,
 *   recoveryTimeoutMs: 60000,
 * });
 *
 * if (breaker.allow()) {
 *   try {
 *     await send();
 *     breaker.recordSuccess();
 *   } catch {
 *     breaker.recordFailure();
 *   }
 * }
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
  clock: Clock = systemClock,
): CircuitBreaker => {
  const { failureThreshold, successThreshold, recoveryTimeoutMs } = config;

  assertPositiveInteger(failureThreshold, "failureThreshold");
  assertPositiveInteger(successThreshold, "successThreshold");
  if (!Number.isFinite(recoveryTimeoutMs) || recoveryTimeoutMs < 0) {
    throw new ConfigurationError(
      `recoveryTimeoutMs must be a non-negative number, got ${recoveryTimeoutMs}`,
      "recoveryTimeoutMs",
    );
  }

  let snapshot: CircuitBreakerSnapshot = {
    state: "CLOSED",
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    openedAt: null,
  };

  const listeners = new Set<StateChangeListener>();

  const recoveryElapsed = (): boolean =>
    snapshot.openedAt !== null && clock.now() - snapshot.openedAt >= recoveryTimeoutMs;

  const effectiveState = (): CircuitBreakerState =>
    snapshot.state === "OPEN" && recoveryElapsed() ? "HALF_OPEN" : snapshot.state;

  const transition = (next: CircuitBreakerSnapshot): void => {
    const previous = snapshot.state;
    snapshot = next;
    if (previous !== next.state) {
      for (const listener of listeners) {
        listener(next.state, previous);
      }
    }
  };

  const open = (): void => {
    transition({
      state: "OPEN",
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
      openedAt: clock.now(),
    });
  };

  // Commits a pending OPEN -> HALF_OPEN transition before an outcome is applied
  const settle = (): void => {
    if (snapshot.state === "OPEN" && recoveryElapsed()) {
      transition({ ...snapshot, state: "HALF_OPEN", consecutiveSuccesses: 0 });
    }
  };

  const allow = (): boolean => effectiveState() !== "OPEN";

  const recordSuccess = (): void => {
    settle();

    switch (snapshot.state) {
      case "CLOSED":
        snapshot = { ...snapshot, consecutiveFailures: 0 };
        return;
      case "HALF_OPEN": {
        const consecutiveSuccesses = snapshot.consecutiveSuccesses + 1;
        if (consecutiveSuccesses >= successThreshold) {
          transition({
            state: "CLOSED",
            consecutiveFailures: 0,
            consecutiveSuccesses: 0,
            openedAt: null,
          });
        } else {
          snapshot = { ...snapshot, consecutiveSuccesses };
        }
        return;
      }
      case "OPEN":
        // Late response from a call admitted before the circuit opened
        return;
    }
  };

  const recordFailure = (): void => {
    settle();

    switch (snapshot.state) {
      case "CLOSED": {
        const consecutiveFailures = snapshot.consecutiveFailures + 1;
        if (consecutiveFailures >= failureThreshold) {
          open();
        } else {
          snapshot = { ...snapshot, consecutiveFailures };
        }
        return;
      }
      case "HALF_OPEN":
        open();
        return;
      case "OPEN":
        return;
    }
  };

  const getSnapshot = (): CircuitBreakerSnapshot => {
    const state = effectiveState();
    if (state === snapshot.state) {
      return { ...snapshot };
    }
    return { ...snapshot, state, consecutiveSuccesses: 0 };
  };

  const reset = (): void => {
    transition({
      state: "CLOSED",
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
      openedAt: null,
    });
  };

  const onStateChange = (listener: StateChangeListener): (() => void) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    allow,
    recordSuccess,
    recordFailure,
    getState: effectiveState,
    getSnapshot,
    reset,
    onStateChange,
  };
};

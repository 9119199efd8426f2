import type { Logger } from "@/lib/logger";
import type { MetricsSink } from "@/lib/metrics";

import type { CircuitBreaker } from "./circuit-breaker";

export interface CircuitBreakerMonitorOptions {
  /** Endpoint the breaker guards, for log context */
  endpoint: string;
  logger: Logger;
  metrics?: MetricsSink;
}

/**
 * Logs circuit breaker transitions and counts openings.
 *
 * @returns Unsubscribe function
 */
export const monitorCircuitBreaker = (
  breaker: CircuitBreaker,
  options: CircuitBreakerMonitorOptions,
): (() => void) => {
  const { endpoint, logger, metrics } = options;

  return breaker.onStateChange((state, previous) => {
    if (state === "OPEN") {
      metrics?.recordCircuitOpening();
      logger.error(
        "Circuit breaker OPENED",
        new Error(`Circuit breaker for ${endpoint} opened`),
        { endpoint, previous },
      );
    } else if (state === "HALF_OPEN") {
      logger.info("Circuit breaker HALF_OPEN, probing", { endpoint });
    } else {
      logger.info("Circuit breaker CLOSED, resuming normal operation", { endpoint, previous });
    }
  });
};

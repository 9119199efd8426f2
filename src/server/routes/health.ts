import { Hono } from "hono";

import type { CircuitBreakerState } from "@/lib/resilience";
import type { BatchSummary } from "@/worker/batch-coordinator";

export interface HealthRouteDeps {
  getCircuitState: () => CircuitBreakerState;
  getBatchSummary?: () => BatchSummary | undefined;
}

export const createHealthRoute = (deps: HealthRouteDeps): Hono => {
  const health = new Hono();

  health.get("/", (c) => {
    const circuitBreakerState = deps.getCircuitState();
    const degraded = circuitBreakerState === "OPEN";
    const summary = deps.getBatchSummary?.();

    return c.json(
      {
        status: degraded ? ("degraded" as const) : ("healthy" as const),
        circuitBreakerState,
        timestamp: new Date().toISOString(),
        ...(summary && { batch: summary }),
      },
      degraded ? 503 : 200,
    );
  });

  return health;
};

/**
 * Token bucket rate limiter.
 *
 * Every state method is synchronous: the refill-then-decrement sequence runs to
 * completion before another worker can observe the bucket, so concurrent
 * callers never both spend the last token.
 */

import { type Clock, systemClock } from "@/lib/clock";
import { ConfigurationError } from "@/lib/errors";

export interface TokenBucketConfig {
  /** Tokens added per second */
  ratePerSecond: number;
  /** Maximum bucket capacity (tokens) */
  burstCapacity: number;
  /** Starting tokens (default: burstCapacity) */
  initialTokens?: number;
  clock?: Clock;
}

export interface AcquireOptions {
  /** Gives up (resolves false) once aborted */
  signal?: AbortSignal;
  /** Gives up (resolves false) rather than wait longer than this in total */
  maxWaitMs?: number;
}

export interface TokenBucket {
  /** Takes one token if available, never waits */
  tryAcquire: () => boolean;
  /** Takes one token, waiting for the refill if necessary */
  acquire: (options?: AcquireOptions) => Promise<boolean>;
  /** Returns the number of available tokens */
  getAvailableTokens: () => number;
  /** Returns the wait time in ms until one token is available */
  getWaitTimeMs: () => number;
  /** Refills the bucket to capacity */
  reset: () => void;
}

interface TokenBucketState {
  tokens: number;
  lastRefillTime: number;
}

/**
 * Creates a token bucket rate limiter.
 *
 * @example
 * ```typescript
 * const bucket = createTokenBucket({ ratePerSecond: 5, burstCapacity: 10 });
 *
 * if (bucket.tryAcquire()) {
 *   // Make request
 * }
 *
 * if (await bucket.acquire({ maxWaitMs: 2000 })) {
 *   // Make request
 * }
 * ```
 */
export const createTokenBucket = (config: TokenBucketConfig): TokenBucket => {
  const { ratePerSecond, burstCapacity, clock = systemClock } = config;
  const initialTokens = config.initialTokens ?? burstCapacity;

  if (!Number.isFinite(ratePerSecond) || ratePerSecond <= 0) {
    throw new ConfigurationError(
      `ratePerSecond must be a positive number, got ${ratePerSecond}`,
      "ratePerSecond",
    );
  }
  if (!Number.isFinite(burstCapacity) || burstCapacity < 1) {
    throw new ConfigurationError(
      `burstCapacity must be at least 1, got ${burstCapacity}`,
      "burstCapacity",
    );
  }
  if (initialTokens < 0 || initialTokens > burstCapacity) {
    throw new ConfigurationError(
      `initialTokens must be between 0 and ${burstCapacity}, got ${initialTokens}`,
      "initialTokens",
    );
  }

  let state: TokenBucketState = {
    tokens: initialTokens,
    lastRefillTime: clock.now(),
  };

  const refill = (): void => {
    const now = clock.now();
    const elapsedSeconds = Math.max(0, now - state.lastRefillTime) / 1000;

    state = {
      tokens: Math.min(burstCapacity, state.tokens + elapsedSeconds * ratePerSecond),
      lastRefillTime: now,
    };
  };

  const tryAcquire = (): boolean => {
    refill();

    if (state.tokens >= 1) {
      state = { ...state, tokens: state.tokens - 1 };
      return true;
    }

    return false;
  };

  const getWaitTimeMs = (): number => {
    refill();

    if (state.tokens >= 1) {
      return 0;
    }

    return Math.ceil(((1 - state.tokens) / ratePerSecond) * 1000);
  };

  const acquire = async (options: AcquireOptions = {}): Promise<boolean> => {
    const { signal, maxWaitMs } = options;
    const startedAt = clock.now();

    for (;;) {
      if (signal?.aborted) {
        return false;
      }
      if (tryAcquire()) {
        return true;
      }

      // Another waiter may take the refilled token first, so re-check after every wait
      const waitMs = Math.max(1, getWaitTimeMs());
      if (maxWaitMs !== undefined && clock.now() - startedAt + waitMs > maxWaitMs) {
        return false;
      }

      await clock.sleep(waitMs, signal);
    }
  };

  const getAvailableTokens = (): number => {
    refill();
    return state.tokens;
  };

  const reset = (): void => {
    state = { tokens: burstCapacity, lastRefillTime: clock.now() };
  };

  return {
    tryAcquire,
    acquire,
    getAvailableTokens,
    getWaitTimeMs,
    reset,
  };
};

/**
 * Thrown at construction time when a component receives an invalid setting.
 * This is the only error the resilience layer throws; everything at run time
 * is reported as a tagged outcome.
 */
export class ConfigurationError extends Error {
  public override readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly setting: string,
  ) {
    super(message);
  }
}

/**
 * An attempt that exceeded its per-request timeout. Retryable.
 */
export class RequestTimeoutError extends Error {
  public override readonly name = "RequestTimeoutError";
  public readonly kind = "timeout";

  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

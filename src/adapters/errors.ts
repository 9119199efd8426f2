/**
 * Transport error types.
 *
 * `status` and `kind` are what the retry classifier reads to decide whether a
 * failed attempt is worth repeating.
 */

import type { FailureReason } from "@/lib/resilience";

export type TransportErrorKind = "http" | "timeout" | "network" | "invalid_response";

export interface TransportErrorDetails {
  kind: TransportErrorKind;
  /** HTTP status for `kind: "http"` */
  status?: number;
  /** System error code for `kind: "network"` (ECONNRESET, ...) */
  code?: string;
  /** Parsed Retry-After header */
  retryAfterMs?: number;
  /** Response body text, for diagnostics */
  body?: string;
  cause?: unknown;
}

export class TransportError extends Error {
  public override readonly name = "TransportError";
  public readonly kind: TransportErrorKind;
  public readonly status?: number;
  public readonly code?: string;
  public readonly retryAfterMs?: number;
  public readonly body?: string;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, { cause: details.cause });
    this.kind = details.kind;
    this.status = details.status;
    this.code = details.code;
    this.retryAfterMs = details.retryAfterMs;
    this.body = details.body;
  }
}

/**
 * A voice API call that ended without a result, for callers that prefer
 * exceptions to outcomes.
 */
export class VoiceApiError extends Error {
  public override readonly name = "VoiceApiError";

  constructor(
    message: string,
    public readonly reason: FailureReason,
    public readonly attemptsUsed: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

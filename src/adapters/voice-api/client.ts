import * as v from "valibot";

import { type Clock, systemClock } from "@/lib/clock";
import { type Logger, silentLogger } from "@/lib/logger";
import type { MetricsSink } from "@/lib/metrics";
import {
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
  type ExecuteOptions,
  type RequestExecutor,
  type RequestOutcome,
  type RetryConfig,
  type TokenBucket,
  type TokenBucketConfig,
  createCircuitBreaker,
  createRequestExecutor,
  createRetryOrchestrator,
  createTokenBucket,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RETRY_CONFIG,
  describeOutcome,
  monitorCircuitBreaker,
} from "@/lib/resilience";

import { TransportError, VoiceApiError } from "../errors";
import type { Transport, TransportRequest } from "../http";

import { type AudioFile, toBlob } from "./audio";
import {
  type DeepfakeResult,
  deepfakeResponseSchema,
  type MfaResult,
  mfaResponseSchema,
  type SarReport,
  type SarResult,
  sarResponseSchema,
} from "./schemas";

export type VoiceApiEndpoint = "deepfake" | "mfa" | "sar";

export const VOICE_API_ENDPOINTS: readonly VoiceApiEndpoint[] = ["deepfake", "mfa", "sar"];

export type VoiceApiPaths = Record<VoiceApiEndpoint, string>;

export const DEFAULT_VOICE_API_PATHS: VoiceApiPaths = {
  deepfake: "/v1/voice/deepfake",
  mfa: "/v1/mfa/voice/verify",
  sar: "/v1/reports/sar",
};

export interface VoiceApiClientConfig {
  transport: Transport;
  rateLimit: TokenBucketConfig;
  circuitBreaker?: CircuitBreakerConfig;
  retry?: RetryConfig;
  /** Per-attempt timeout (ms) */
  timeoutMs?: number;
  /** How long a request may wait for a rate limiter token (ms) */
  rateLimitWaitMs?: number;
  paths?: Partial<VoiceApiPaths>;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsSink;
}

export interface VoiceApiClient {
  detectDeepfake: (
    audio: AudioFile,
    metadata?: Record<string, unknown>,
    options?: ExecuteOptions,
  ) => Promise<RequestOutcome<DeepfakeResult>>;
  verifyMfa: (
    audio: AudioFile,
    enrollmentId: string,
    context?: Record<string, unknown>,
    options?: ExecuteOptions,
  ) => Promise<RequestOutcome<MfaResult>>;
  submitSar: (report: SarReport, options?: ExecuteOptions) => Promise<RequestOutcome<SarResult>>;
  /** Effective state of one endpoint's breaker, or the worst across all endpoints */
  getCircuitState: (endpoint?: VoiceApiEndpoint) => CircuitBreakerState;
  readonly limiter: TokenBucket;
  /** Stops logging breaker transitions */
  close: () => void;
}

interface EndpointGuard {
  breaker: CircuitBreaker;
  executor: RequestExecutor;
}

const STATE_SEVERITY: Record<CircuitBreakerState, number> = {
  CLOSED: 0,
  HALF_OPEN: 1,
  OPEN: 2,
};

/**
 * Validates a response body; a body that does not match is fatal.
 */
const parseResponse = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  request: TransportRequest,
  status: number,
  data: unknown,
): v.InferOutput<TSchema> => {
  const result = v.safeParse(schema, data);
  if (!result.success) {
    const issues = result.issues
      .map((issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`)
      .join("; ");
    throw new TransportError(`${request.method} ${request.path} returned an unexpected body: ${issues}`, {
      kind: "invalid_response",
      status,
      body: JSON.stringify(data),
    });
  }
  return result.output;
};

/**
 * Creates a client for the voice fraud detection API.
 *
 * The client owns one rate limiter shared by every endpoint and one circuit
 * breaker per endpoint, so a failing SAR service does not block deepfake
 * scoring. Every method resolves to a `RequestOutcome`; use `unwrap` to turn
 * failures into exceptions.
 *
 * @example
 * ```typescript
 * const client = createVoiceApiClient({
 *   transport: createHttpTransport({ baseUrl, apiKey }),
 *   rateLimit: { ratePerSecond: 5, burstCapacity: 10 },
 *   logger,
 * });
 *
 * const outcome = await client.detectDeepfake(await loadAudioFile("call.wav"));
 * ```
 */
export const createVoiceApiClient = (config: VoiceApiClientConfig): VoiceApiClient => {
  const {
    transport,
    circuitBreaker = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    retry = DEFAULT_RETRY_CONFIG,
    clock = systemClock,
    logger = silentLogger,
    metrics,
  } = config;
  const paths: VoiceApiPaths = { ...DEFAULT_VOICE_API_PATHS, ...config.paths };

  const limiter = createTokenBucket({ ...config.rateLimit, clock });
  const retryOrchestrator = createRetryOrchestrator(retry);

  const unsubscribers: (() => void)[] = [];

  const createEndpoint = (endpoint: VoiceApiEndpoint): EndpointGuard => {
    const endpointLogger = logger.child({ endpoint });
    const breaker = createCircuitBreaker(circuitBreaker, clock);
    const executor = createRequestExecutor({
      limiter,
      breaker,
      retry: retryOrchestrator,
      timeoutMs: config.timeoutMs,
      rateLimitWaitMs: config.rateLimitWaitMs,
      clock,
      logger: endpointLogger,
      metrics,
    });
    unsubscribers.push(
      monitorCircuitBreaker(breaker, { endpoint: paths[endpoint], logger: endpointLogger, metrics }),
    );
    return { breaker, executor };
  };

  const guards: Record<VoiceApiEndpoint, EndpointGuard> = {
    deepfake: createEndpoint("deepfake"),
    mfa: createEndpoint("mfa"),
    sar: createEndpoint("sar"),
  };

  const call = <TSchema extends v.GenericSchema>(
    endpoint: VoiceApiEndpoint,
    schema: TSchema,
    buildRequest: () => TransportRequest,
    options: ExecuteOptions | undefined,
  ): Promise<RequestOutcome<v.InferOutput<TSchema>>> =>
    guards[endpoint].executor.execute(async (signal) => {
      // Rebuilt per attempt: a FormData body cannot be reused once consumed
      const request = buildRequest();
      const response = await transport.send(request, signal);
      return parseResponse(schema, request, response.status, response.data);
    }, options);

  const detectDeepfake: VoiceApiClient["detectDeepfake"] = (audio, metadata = {}, options) =>
    call(
      "deepfake",
      deepfakeResponseSchema,
      () => {
        const form = new FormData();
        form.append("audio", toBlob(audio), audio.name);
        form.append("metadata", JSON.stringify(metadata));
        return { method: "POST", path: paths.deepfake, body: { type: "multipart", form } };
      },
      { label: audio.name, ...options },
    );

  const verifyMfa: VoiceApiClient["verifyMfa"] = (audio, enrollmentId, context = {}, options) =>
    call(
      "mfa",
      mfaResponseSchema,
      () => {
        const form = new FormData();
        form.append("audio", toBlob(audio), audio.name);
        form.append("enrollment_id", enrollmentId);
        form.append("context", JSON.stringify(context));
        return { method: "POST", path: paths.mfa, body: { type: "multipart", form } };
      },
      { label: `${enrollmentId}:${audio.name}`, ...options },
    );

  const submitSar: VoiceApiClient["submitSar"] = (report, options) =>
    call(
      "sar",
      sarResponseSchema,
      () => ({
        method: "POST",
        path: paths.sar,
        body: {
          type: "json",
          value: {
            session_id: report.sessionId,
            decision: report.decision,
            reason: report.reason,
            metadata: report.metadata ?? {},
          },
        },
      }),
      { label: report.sessionId, ...options },
    );

  const getCircuitState = (endpoint?: VoiceApiEndpoint): CircuitBreakerState => {
    if (endpoint) {
      return guards[endpoint].breaker.getState();
    }
    return VOICE_API_ENDPOINTS.map((name) => guards[name].breaker.getState()).reduce((worst, state) =>
      STATE_SEVERITY[state] > STATE_SEVERITY[worst] ? state : worst,
    );
  };

  const close = (): void => {
    for (const unsubscribe of unsubscribers.splice(0)) {
      unsubscribe();
    }
  };

  return { detectDeepfake, verifyMfa, submitSar, getCircuitState, limiter, close };
};

/**
 * Returns the value of a successful outcome or throws a `VoiceApiError`.
 */
export const unwrap = <T>(outcome: RequestOutcome<T>): T => {
  if (outcome.succeeded) {
    return outcome.value;
  }
  throw new VoiceApiError(
    `Voice API request ${describeOutcome(outcome)}`,
    outcome.reason,
    outcome.attemptsUsed,
    outcome.error,
  );
};

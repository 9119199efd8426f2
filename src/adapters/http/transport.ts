import { parseRetryAfterMs } from "@/lib/resilience";

import { TransportError } from "../errors";

import type { Transport, TransportRequest, TransportResponse } from "./types";

export interface HttpTransportConfig {
  baseUrl: string;
  apiKey: string;
  fetch?: typeof fetch;
}

/**
 * Reads a system error code from a fetch failure (`TypeError: fetch failed`
 * carries it on `cause`).
 */
const getNetworkErrorCode = (error: unknown): string | undefined => {
  for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
    if (
      candidate !== null &&
      typeof candidate === "object" &&
      "code" in candidate &&
      typeof candidate.code === "string"
    ) {
      return candidate.code;
    }
  }
  return undefined;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const buildBody = (request: TransportRequest): { body?: RequestInit["body"]; contentType?: string } => {
  switch (request.body?.type) {
    case "json":
      return { body: JSON.stringify(request.body.value), contentType: "application/json" };
    case "multipart":
      // fetch sets the multipart boundary itself
      return { body: request.body.form };
    case undefined:
      return {};
  }
};

/**
 * Creates a `fetch`-based transport with bearer authentication.
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({
 *   baseUrl: "https://api.example.com/",
 *   apiKey: "test-key",
 * });
 *
 * const response = await transport.send(
 *   { method: "POST", path: "/v1/reports/sar", body: { type: "json", value: sar } },
 *   AbortSignal.timeout(30_000),
 * );
 * ```
 */
export const createHttpTransport = (config: HttpTransportConfig): Transport => {
  const baseUrl = config.baseUrl.replace(/\/+$/, "");

  const send = async (
    request: TransportRequest,
    signal: AbortSignal,
  ): Promise<TransportResponse> => {
    const { method, path } = request;
    const { body, contentType } = buildBody(request);

    let response: Response;
    try {
      response = await (config.fetch ?? fetch)(`${baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          Accept: "application/json",
          ...(contentType && { "Content-Type": contentType }),
          ...request.headers,
        },
        body,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new TransportError(`${method} ${path} failed: ${errorMessage(error)}`, {
        kind: "network",
        code: getNetworkErrorCode(error),
        cause: error,
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new TransportError(`${method} ${path} body read failed: ${errorMessage(error)}`, {
        kind: "network",
        code: getNetworkErrorCode(error),
        cause: error,
      });
    }

    if (!response.ok) {
      throw new TransportError(
        `${method} ${path} failed: ${response.status} ${response.statusText}`.trim(),
        {
          kind: "http",
          status: response.status,
          retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after")) ?? undefined,
          body: text,
        },
      );
    }

    let data: unknown;
    try {
      data = text.length > 0 ? JSON.parse(text) : null;
    } catch (error) {
      throw new TransportError(`${method} ${path} returned invalid JSON`, {
        kind: "invalid_response",
        status: response.status,
        body: text,
        cause: error,
      });
    }

    return { status: response.status, data };
  };

  return { send };
};

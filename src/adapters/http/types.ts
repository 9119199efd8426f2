export type TransportBody =
  | { type: "json"; value: unknown }
  | { type: "multipart"; form: FormData };

export interface TransportRequest {
  method: "GET" | "POST";
  /** Path appended to the transport's base URL */
  path: string;
  body?: TransportBody;
  headers?: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  /** Parsed JSON body; validated by the caller */
  data: unknown;
}

/**
 * Opaque capability the resilience layer protects. Failures reject with a
 * `TransportError`.
 */
export interface Transport {
  send: (request: TransportRequest, signal: AbortSignal) => Promise<TransportResponse>;
}

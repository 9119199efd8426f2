import { afterEach, describe, expect, it, vi } from "vitest";

import { TransportError } from "../errors";

import { createHttpTransport } from "./transport";

const transport = createHttpTransport({
  baseUrl: "https://voice.example.test/",
  apiKey: "test-key",
});

const send = (path = "/v1/reports/sar") =>
  transport.send(
    { method: "POST", path, body: { type: "json", value: { session_id: "s-1" } } },
    new AbortController().signal,
  );

const captureError = async (promise: Promise<unknown>): Promise<TransportError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TransportError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a TransportError");
};

describe("createHttpTransport", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends JSON with bearer auth and parses the response", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ case_id: "c-1" }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await send();

    expect(response).toEqual({ status: 200, data: { case_id: "c-1" } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://voice.example.test/v1/reports/sar");
    expect(init).toMatchObject({
      method: "POST",
      body: '{"session_id":"s-1"}',
      headers: {
        Authorization: "Bearer test-key",
        Accept: "application/json",
        "Content-Type": "application/json",
      },
    });
  });

  it("passes multipart bodies through without a content type", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("{}", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const form = new FormData();
    form.append("enrollment_id", "e-1");
    await transport.send(
      { method: "POST", path: "/v1/mfa/voice/verify", body: { type: "multipart", form } },
      new AbortController().signal,
    );

    const [, init] = fetchMock.mock.calls[0];
    expect(init.body).toBe(form);
    expect(init.headers).not.toHaveProperty("Content-Type");
  });

  it("returns null data for an empty body", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(null, { status: 204 })));

    await expect(send()).resolves.toEqual({ status: 204, data: null });
  });

  it("turns a non-2xx response into an http error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response("upstream down", { status: 503, statusText: "Service Unavailable" }),
      ),
    );

    const error = await captureError(send());

    expect(error.kind).toBe("http");
    expect(error.status).toBe(503);
    expect(error.body).toBe("upstream down");
    expect(error.retryAfterMs).toBeUndefined();
    expect(error.message).toBe("POST /v1/reports/sar failed: 503 Service Unavailable");
  });

  it("reads Retry-After from a 429", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response("", { status: 429, headers: { "Retry-After": "2" } }),
      ),
    );

    const error = await captureError(send());

    expect(error.status).toBe(429);
    expect(error.retryAfterMs).toBe(2000);
  });

  it("reports network failures with their system code", async () => {
    const cause = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed", { cause })));

    const error = await captureError(send());

    expect(error.kind).toBe("network");
    expect(error.code).toBe("ECONNRESET");
    expect(error.status).toBeUndefined();
    expect(error.message).toBe("POST /v1/reports/sar failed: fetch failed");
  });

  it("flags a body that is not JSON as invalid_response", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("<html>", { status: 200 })));

    const error = await captureError(send());

    expect(error.kind).toBe("invalid_response");
    expect(error.body).toBe("<html>");
  });

  it("rethrows the abort reason when the caller cancels", async () => {
    const controller = new AbortController();
    const abortError = new DOMException("aborted", "AbortError");
    vi.stubGlobal(
      "fetch",
      vi.fn().mockImplementation(() => {
        controller.abort();
        return Promise.reject(abortError);
      }),
    );

    await expect(
      transport.send({ method: "GET", path: "/v1/ping" }, controller.signal),
    ).rejects.toBe(abortError);
  });
});

import { describe, expect, it, vi } from "vitest";
import type { ToolkitLogger } from "@/logging";
import { type FetchLike, pushJSONToRemote } from "../push-json";

const makeLogger = (): ToolkitLogger => ({
  info: vi.fn(() => "info-id"),
  warn: vi.fn(() => "warn-id"),
  error: vi.fn(() => "error-5"),
});

const URI = "http://remote.test/hooks";

describe("pushJSONToRemote", () => {
  it("POSTs the JSON body and returns the status code", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response("accepted", { status: 202 })
    );

    const result = await pushJSONToRemote(URI, { event: "signup", id: 3 }, {
      fetch,
    });

    expect(result.isOk).toBe(true);
    expect(result.value?.statusCode).toBe(202);
    expect(await result.value?.response.text()).toBe("accepted");

    expect(fetch).toHaveBeenCalledOnce();
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(URI);
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"event":"signup","id":3}');
    expect(new Headers(init?.headers).get("content-type")).toBe(
      "application/json"
    );
  });

  it("passes non-2xx responses through untouched", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(null, { status: 503 })
    );
    const result = await pushJSONToRemote(URI, [], { fetch });
    expect(result.value?.statusCode).toBe(503);
  });

  it("merges extra headers and keeps the JSON content type", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(null));
    await pushJSONToRemote(URI, null, {
      fetch,
      headers: { Authorization: "Bearer test-secret", "Content-Type": "text/plain" },
    });

    const headers = new Headers(fetch.mock.calls[0]?.[1].headers);
    expect(headers.get("authorization")).toBe("Bearer test-secret");
    expect(headers.get("content-type")).toBe("application/json");
  });

  it("sends null for undefined data", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(null));
    await pushJSONToRemote(URI, undefined, { fetch });
    expect(fetch.mock.calls[0]?.[1].body).toBe("null");
  });

  it("fails before sending when the data cannot be encoded", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(null));
    const logger = makeLogger();

    const result = await pushJSONToRemote(URI, { big: BigInt(2) }, {
      fetch,
      logger,
    });

    expect(result.isErr).toBe(true);
    expect(result.error).toMatch(/^\[error-5\] could not encode request body: /);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("returns transport failures as errors", async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError("connection refused");
    });
    const logger = makeLogger();

    const result = await pushJSONToRemote(URI, {}, { fetch, logger });

    expect(result.error).toBe("[error-5] request failed: connection refused");
    expect(logger.error).toHaveBeenCalledWith({
      atFunction: "pushJSONToRemote",
      message: "request failed: connection refused",
      data: { uri: URI, timeout: undefined },
    });
  });

  it("aborts after the timeout", async () => {
    const fetch = vi.fn<FetchLike>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => {
            reject(new DOMException("aborted", "AbortError"));
          });
        })
    );
    const logger = makeLogger();

    const result = await pushJSONToRemote(URI, {}, {
      fetch,
      logger,
      timeout: 10,
    });

    expect(result.error).toBe("[error-5] request timed out");
  });

  it("leaves the signal alone without a timeout", async () => {
    const fetch = vi.fn<FetchLike>(async (_input, init) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return new Response(null, { status: init.signal?.aborted ? 499 : 204 });
    });

    const result = await pushJSONToRemote(URI, {}, { fetch });

    expect(result.value?.statusCode).toBe(204);
  });
});

import { type Context, Hono } from "hono";
import { describe, expect, it, vi } from "vitest";
import type { ToolkitLogger } from "@/logging";
import type { Result } from "@/utils";
import { errorJSON, successJSON, writeJSON } from "../write-json";

const makeLogger = (): ToolkitLogger => ({
  info: vi.fn(() => "info-id"),
  warn: vi.fn(() => "warn-id"),
  error: vi.fn(() => "error-3"),
});

/** Serves one request through `write` and returns the response with the writer's result */
async function respond(write: (c: Context) => Result<Response, string>) {
  const outcomes: Result<Response, string>[] = [];
  const app = new Hono();
  app.get("/", (c) => {
    const outcome = write(c);
    outcomes.push(outcome);
    return outcome.isOk ? outcome.value : c.text("not written", 500);
  });
  const response = await app.request("/");
  return { response, outcome: outcomes[0] };
}

describe("writeJSON", () => {
  it("writes the status, headers and body", async () => {
    const { response, outcome } = await respond((c) =>
      writeJSON(c, 201, { id: 7, tags: ["a"] }, { headers: { "X-Trace": "t1" } })
    );
    expect(outcome?.isOk).toBe(true);
    expect(response.status).toBe(201);
    expect(response.headers.get("content-type")).toBe("application/json");
    expect(response.headers.get("x-trace")).toBe("t1");
    expect(await response.text()).toBe('{"id":7,"tags":["a"]}');
  });

  it("accepts a Headers instance", async () => {
    const headers = new Headers({ "Cache-Control": "no-store" });
    const { response } = await respond((c) =>
      writeJSON(c, 200, [1], { headers })
    );
    expect(response.headers.get("cache-control")).toBe("no-store");
  });

  it("keeps every value of a repeated header", async () => {
    const { response } = await respond((c) =>
      writeJSON(c, 200, {}, {
        headers: [
          ["Set-Cookie", "session=test-session; Path=/"],
          ["Set-Cookie", "theme=dark; Path=/"],
        ],
      })
    );
    expect(response.headers.getSetCookie()).toEqual([
      "session=test-session; Path=/",
      "theme=dark; Path=/",
    ]);
  });

  it("keeps Content-Type even when a header tries to override it", async () => {
    const { response } = await respond((c) =>
      writeJSON(c, 200, {}, { headers: { "Content-Type": "text/plain" } })
    );
    expect(response.headers.get("content-type")).toBe("application/json");
  });

  it("encodes undefined as null", async () => {
    const { response } = await respond((c) => writeJSON(c, 200, undefined));
    expect(await response.text()).toBe("null");
  });

  it("returns an error for cyclic data and writes nothing", async () => {
    const logger = makeLogger();
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;

    const { response, outcome } = await respond((c) =>
      writeJSON(c, 200, cyclic, { logger })
    );
    expect(outcome?.isErr).toBe(true);
    expect(outcome?.error).toMatch(/^\[error-3\] could not encode JSON response: /);
    expect(response.status).toBe(500);
    expect(await response.text()).toBe("not written");
  });

  it("returns an error for BigInt values", async () => {
    const logger = makeLogger();
    const { outcome } = await respond((c) =>
      writeJSON(c, 200, { count: BigInt(1) }, { logger })
    );
    expect(outcome?.isErr).toBe(true);
    expect(logger.error).toHaveBeenCalledOnce();
  });

  it("returns an error for values with no JSON form", async () => {
    const logger = makeLogger();
    const { outcome } = await respond((c) =>
      writeJSON(c, 200, () => "fn", { logger })
    );
    expect(outcome?.error).toBe(
      "[error-3] could not encode JSON response: value has no JSON form"
    );
  });
});

describe("errorJSON", () => {
  it("defaults to 400 and reads the message from an Error", async () => {
    const { response } = await respond((c) => errorJSON(c, new Error("boom")));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: true, message: "boom" });
  });

  it("accepts a string and a custom status", async () => {
    const { response } = await respond((c) =>
      errorJSON(c, "not allowed", 403)
    );
    expect(response.status).toBe(403);
    expect(await response.text()).toBe('{"error":true,"message":"not allowed"}');
  });

  it("accepts any object with a message", async () => {
    const decodeError = {
      kind: "empty-body",
      message: "request body must not be empty",
    };
    const { response } = await respond((c) => errorJSON(c, decodeError, 422));
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: true,
      message: "request body must not be empty",
    });
  });
});

describe("successJSON", () => {
  it("wraps data in the envelope", async () => {
    const { response } = await respond((c) =>
      successJSON(c, "created", { id: 7 }, 201)
    );
    expect(response.status).toBe(201);
    expect(await response.text()).toBe(
      '{"error":false,"message":"created","data":{"id":7}}'
    );
  });

  it("leaves data out when there is none", async () => {
    const { response } = await respond((c) => successJSON(c, "done"));
    expect(response.status).toBe(200);
    expect(await response.text()).toBe('{"error":false,"message":"done"}');
  });
});

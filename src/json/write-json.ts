import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  describeError,
  handleError,
  ok,
  type Result,
  safeTrySync,
} from "@/utils";
import type { JSONEnvelope, WriteJSONOptions } from "./types";

/**
 * Serializes `data` and writes it as the response body.
 * `undefined` encodes as `null`. Values JSON cannot represent (cycles,
 * BigInt, bare functions) return an Err and nothing is written.
 */
export function writeJSON(
  c: Context,
  status: ContentfulStatusCode,
  data: unknown,
  options: WriteJSONOptions = {}
): Result<Response, string> {
  const serialized = safeTrySync(() => JSON.stringify(data ?? null));
  if (serialized.isErr) {
    return handleError({
      message: `could not encode JSON response: ${describeError(serialized.error)}`,
      logger: options.logger,
      atFunction: "writeJSON",
    });
  }
  // JSON.stringify yields undefined for functions and symbols
  const body: string | undefined = serialized.value;
  if (body === undefined) {
    return handleError({
      message: "could not encode JSON response: value has no JSON form",
      logger: options.logger,
      atFunction: "writeJSON",
    });
  }

  // Repeated names (Set-Cookie) arrive one entry at a time and must all survive
  const applied = new Set<string>();
  new Headers(options.headers).forEach((value, key) => {
    c.header(key, value, { append: applied.has(key) });
    applied.add(key);
  });
  c.header("Content-Type", "application/json");
  return ok(c.body(body, status));
}

/** Anything an error message can be read from */
export type ErrorLike = Error | string | { message: string };

const messageOf = (error: ErrorLike): string =>
  typeof error === "string" ? error : error.message;

/**
 * Writes the error envelope `{ "error": true, "message": ... }`.
 *
 * @example
 * ```typescript
 * const body = await readJSON(c, schema);
 * if (!body.status) {
 *   return errorJSON(c, body.error);
 * }
 * ```
 */
export function errorJSON(
  c: Context,
  error: ErrorLike,
  status: ContentfulStatusCode = 400,
  options: WriteJSONOptions = {}
): Result<Response, string> {
  const envelope: JSONEnvelope = { error: true, message: messageOf(error) };
  return writeJSON(c, status, envelope, options);
}

/** Writes the success envelope; `data` is left out when undefined */
export function successJSON<T>(
  c: Context,
  message: string,
  data?: T,
  status: ContentfulStatusCode = 200,
  options: WriteJSONOptions = {}
): Result<Response, string> {
  const envelope: JSONEnvelope<T> =
    data === undefined ? { error: false, message } : { error: false, message, data };
  return writeJSON(c, status, envelope, options);
}

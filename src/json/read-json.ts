import { prettifyError, type ZodType } from "zod";
import {
  createDiagnosticsLog,
  describeError,
  readBodyWithLimit,
  type RequestSource,
  safeTrySync,
} from "@/utils";
import { scanJSONValue, skipWhitespace } from "./scan-json";
import type { DecodeResult, JSONDecodeError, ReadJSONOptions } from "./types";
import { findUnknownField } from "./unknown-fields";

/** 1 MiB */
export const DEFAULT_MAX_JSON_BYTES = 1024 * 1024;

const BADLY_FORMED = "request body contains badly-formed JSON";

const fail = (error: JSONDecodeError): DecodeResult<never> => ({
  status: false,
  error,
});

function hasPath(value: unknown, path: readonly PropertyKey[]): boolean {
  let current: unknown = value;
  for (const key of path) {
    if (
      typeof current !== "object" ||
      current === null ||
      !Object.hasOwn(current, key)
    ) {
      return false;
    }
    current = Reflect.get(current, key);
  }
  return true;
}

/** Maps the first schema issue onto the decode error a client sees */
function schemaFailure(
  issues: ReadonlyArray<{ code: string; path: PropertyKey[] }>,
  value: unknown,
  valueEnd: number,
  summary: string
): JSONDecodeError {
  const [first] = issues;
  if (first?.code === "invalid_type") {
    const field = first.path.map(String).join(".");
    if (!hasPath(value, first.path)) {
      return {
        kind: "invalid",
        message: `request body is missing field "${field}"`,
      };
    }
    if (field) {
      return {
        kind: "type-mismatch",
        message: `request body contains incorrect JSON type for field "${field}"`,
        field,
        offset: null,
      };
    }
    return {
      kind: "type-mismatch",
      message: `request body contains incorrect JSON type (at character ${valueEnd})`,
      field: null,
      offset: valueEnd,
    };
  }
  return { kind: "invalid", message: `request body is invalid: ${summary}` };
}

/**
 * Decodes a request body holding exactly one JSON value and validates it
 * against `schema`.
 *
 * Keys the schema does not describe are rejected unless
 * `allowUnknownFields` is set. Every failure comes back as a
 * {@link JSONDecodeError} with a client-safe message.
 *
 * @example
 * ```typescript
 * const Signup = z.object({ email: z.email(), name: z.string() });
 *
 * app.post("/signup", async (c) => {
 *   const body = await readJSON(c, Signup);
 *   if (!body.status) {
 *     return errorJSON(c, body.error);
 *   }
 *   return successJSON(c, "welcome", { name: body.data.name }, 201);
 * });
 * ```
 */
export async function readJSON<T>(
  c: RequestSource,
  schema: ZodType<T>,
  options: ReadJSONOptions = {}
): Promise<DecodeResult<T>> {
  const log = createDiagnosticsLog("JSON", {
    diagnostics: options.diagnostics,
    logger: options.logger,
  });
  const maxBytes = options.maxBytes || DEFAULT_MAX_JSON_BYTES;

  const body = await readBodyWithLimit(c.req.raw, maxBytes);
  if (body.isErr) {
    log("Body read failed", body.error);
    if (body.error.kind === "too-large") {
      return fail({
        kind: "too-large",
        message: `request body must not be larger than ${maxBytes} bytes`,
        limit: maxBytes,
      });
    }
    return fail({
      kind: "invalid",
      message: `request body could not be read: ${body.error.message}`,
    });
  }

  const bytes = new Uint8Array(body.value);
  const scanned = scanJSONValue(bytes);
  if (!scanned.status) {
    log("Scan failed", scanned);
    if (scanned.kind === "empty") {
      return fail({
        kind: "empty-body",
        message: "request body must not be empty",
      });
    }
    if (scanned.kind === "truncated") {
      return fail({ kind: "truncated", message: BADLY_FORMED });
    }
    return fail({
      kind: "syntax",
      message: `${BADLY_FORMED} (at character ${scanned.offset})`,
      offset: scanned.offset,
    });
  }

  if (skipWhitespace(bytes, scanned.end) < bytes.length) {
    return fail({
      kind: "multiple-values",
      message: "request body must only contain a single JSON value",
    });
  }

  const text = new TextDecoder().decode(
    bytes.subarray(scanned.start, scanned.end)
  );
  const parsed = safeTrySync((): unknown => JSON.parse(text));
  if (parsed.isErr) {
    return fail({
      kind: "invalid",
      message: `${BADLY_FORMED}: ${describeError(parsed.error)}`,
    });
  }
  const value = parsed.value;

  if (!options.allowUnknownFields) {
    const unknownField = findUnknownField(schema, value);
    if (unknownField) {
      return fail({
        kind: "unknown-field",
        message: `request body contains unknown key "${unknownField}"`,
        field: unknownField,
      });
    }
  }

  const validated = schema.safeParse(value);
  if (!validated.success) {
    const error = schemaFailure(
      validated.error.issues,
      value,
      scanned.end,
      prettifyError(validated.error)
    );
    log("Validation failed", error);
    return fail(error);
  }

  return { status: true, data: validated.data };
}

/**
 * Multipart body parsing for the upload pipeline.
 * The body is read under a byte ceiling first, then handed to the platform's
 * FormData parser; string fields are dropped and file entries are grouped by field.
 */

import { describeError, readBodyWithLimit, safeTry } from "@/utils";
import type { FilePart, RequestSource, UploadError } from "./types";

type ParseResult =
  | { status: true; data: FormData }
  | { status: false; error: UploadError };

const MULTIPART = "multipart/form-data";

/**
 * Reads and parses a multipart request body.
 * Fails with too-large before parsing when the body passes `maxBytes`.
 */
export async function parseMultipartBody(
  c: RequestSource,
  maxBytes: number
): Promise<ParseResult> {
  const contentType = c.req.raw.headers.get("content-type") ?? "";
  if (!contentType.toLowerCase().includes(MULTIPART)) {
    return {
      status: false,
      error: {
        kind: "malformed",
        message: `request content type must be ${MULTIPART}`,
      },
    };
  }

  const body = await readBodyWithLimit(c.req.raw, maxBytes);
  if (body.isErr) {
    if (body.error.kind === "too-large") {
      return {
        status: false,
        error: {
          kind: "too-large",
          message: `uploaded data exceeds the maximum allowed size of ${maxBytes} bytes`,
          limit: maxBytes,
        },
      };
    }
    return {
      status: false,
      error: {
        kind: "malformed",
        message: `failed to read request body: ${body.error.message}`,
      },
    };
  }

  const parsed = await safeTry(() =>
    new Response(body.value, {
      headers: { "content-type": contentType },
    }).formData()
  );
  if (parsed.isErr) {
    return {
      status: false,
      error: {
        kind: "malformed",
        message: `failed to parse multipart form data: ${describeError(parsed.error)}`,
      },
    };
  }

  return { status: true, data: parsed.value };
}

/**
 * Collects file entries grouped by field, fields in first-appearance order,
 * entries within a field in body order. String fields are skipped.
 */
export function collectFileParts(formData: FormData): FilePart[] {
  const byField = new Map<string, File[]>();

  formData.forEach((value, key) => {
    if (typeof value === "string") {
      return;
    }
    const existing = byField.get(key);
    if (existing) {
      existing.push(value);
    } else {
      byField.set(key, [value]);
    }
  });

  const parts: FilePart[] = [];
  for (const [field, files] of byField) {
    for (const file of files) {
      parts.push({ field, file });
    }
  }
  return parts;
}

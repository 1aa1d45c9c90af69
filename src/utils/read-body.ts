import { describeError, err, ok, type Result } from "./safe-try";

/** Minimal request context a body reader needs; a Hono Context satisfies it */
export interface RequestSource {
  req: { raw: Request };
}

export type BodyReadError =
  | { kind: "too-large"; limit: number }
  | { kind: "unreadable"; message: string };

/**
 * Reads a request body into memory, stopping as soon as it grows past `limit` bytes.
 * A declared Content-Length above the limit is rejected before reading anything.
 */
export async function readBodyWithLimit(
  request: Request,
  limit: number
): Promise<Result<ArrayBuffer, BodyReadError>> {
  const declared = Number(request.headers.get("content-length"));
  if (Number.isFinite(declared) && declared > limit) {
    return err({ kind: "too-large", limit });
  }

  if (!request.body) {
    return ok(new ArrayBuffer(0));
  }

  const reader = request.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      total += value.byteLength;
      if (total > limit) {
        await reader.cancel();
        return err({ kind: "too-large", limit });
      }
      chunks.push(value);
    }
  } catch (error) {
    return err({ kind: "unreadable", message: describeError(error) });
  } finally {
    reader.releaseLock();
  }

  const buffer = new ArrayBuffer(total);
  const view = new Uint8Array(buffer);
  let offset = 0;
  for (const chunk of chunks) {
    view.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return ok(buffer);
}

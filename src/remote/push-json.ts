import type { ToolkitLogger } from "@/logging";
import {
  createDiagnosticsLog,
  describeError,
  handleError,
  ok,
  type Result,
  safeTry,
  safeTrySync,
} from "@/utils";

export type FetchLike = (
  input: string,
  init: RequestInit
) => Promise<Response>;

export interface PushJSONOptions {
  /** Transport to send through. Default: global fetch */
  fetch?: FetchLike;
  /** Extra request headers; Content-Type is always application/json */
  headers?: HeadersInit;
  /** Milliseconds before the request is aborted. Default: no timeout */
  timeout?: number;
  logger?: ToolkitLogger;
  diagnostics?: boolean;
}

export interface PushJSONResponse {
  /** Unread; the caller must consume or cancel `response.body` */
  response: Response;
  statusCode: number;
}

/**
 * POSTs `data` as JSON to `uri` and hands back the raw response.
 * The body is never read here, so large or streamed replies stay with the caller.
 *
 * @example
 * ```typescript
 * const sent = await pushJSONToRemote("https://hooks.example.test/events", event, {
 *   timeout: 5_000,
 * });
 * if (sent.isErr) {
 *   return errorJSON(c, sent.error, 502);
 * }
 * await sent.value.response.body?.cancel();
 * ```
 */
export async function pushJSONToRemote(
  uri: string,
  data: unknown,
  options: PushJSONOptions = {}
): Promise<Result<PushJSONResponse, string>> {
  const log = createDiagnosticsLog("RemotePush", {
    diagnostics: options.diagnostics,
    logger: options.logger,
  });

  const serialized = safeTrySync(() => JSON.stringify(data ?? null));
  if (serialized.isErr) {
    return handleError({
      message: `could not encode request body: ${describeError(serialized.error)}`,
      data: { uri },
      logger: options.logger,
      atFunction: "pushJSONToRemote",
    });
  }

  const headers = new Headers(options.headers);
  headers.set("Content-Type", "application/json");

  const controller = new AbortController();
  const timeoutId =
    options.timeout === undefined
      ? null
      : setTimeout(() => controller.abort(), options.timeout);

  const send: FetchLike = options.fetch ?? fetch;
  log(`POST ${uri}`);
  const sent = await safeTry(() =>
    send(uri, {
      method: "POST",
      headers,
      body: serialized.value,
      signal: controller.signal,
    })
  ).finally(() => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  });

  if (sent.isErr) {
    const message = controller.signal.aborted
      ? "request timed out"
      : `request failed: ${describeError(sent.error)}`;
    return handleError({
      message,
      data: { uri, timeout: options.timeout },
      logger: options.logger,
      atFunction: "pushJSONToRemote",
    });
  }

  log(`Response ${sent.value.status} from ${uri}`);
  return ok({ response: sent.value, statusCode: sent.value.status });
}

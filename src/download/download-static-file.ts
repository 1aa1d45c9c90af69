import { basename, relative, resolve, sep } from "node:path";
import { serveStatic } from "@hono/node-server/serve-static";
import type { Context } from "hono";

export interface DownloadOptions {
  /** Directory holding the file; relative paths resolve from the working directory */
  directory: string;
  /** File to send, relative to `directory` */
  fileName: string;
  /** Name the browser saves the file under. Default: the base name of `fileName` */
  displayName?: string;
}

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;

/** Quoted-string form of a filename for the Content-Disposition header */
export function contentDisposition(displayName: string): string {
  const quoted = displayName
    .replace(CONTROL_CHARACTERS, "")
    .replace(/[\\"]/g, "\\$&");
  return `attachment; filename="${quoted}"`;
}

/**
 * Sends a file from disk as a download.
 * Names that resolve outside `directory` are treated as missing.
 * Content type, range requests and streaming come from serveStatic;
 * a missing file answers through `c.notFound()`.
 *
 * @example
 * ```typescript
 * app.get("/reports/:id", (c) =>
 *   downloadStaticFile(c, {
 *     directory: "./storage/reports",
 *     fileName: `${c.req.param("id")}.pdf`,
 *     displayName: "Quarterly report.pdf",
 *   })
 * );
 * ```
 */
export async function downloadStaticFile(
  c: Context,
  options: DownloadOptions
): Promise<Response> {
  const directory = resolve(options.directory);
  const target = resolve(directory, options.fileName);
  if (!target.startsWith(directory + sep)) {
    return c.notFound();
  }

  const serve = serveStatic({
    root: relative(process.cwd(), directory),
    path: relative(directory, target),
  });

  const served = await serve(c, async () => {});
  if (!served) {
    return c.notFound();
  }

  served.headers.set(
    "Content-Disposition",
    contentDisposition(options.displayName ?? basename(options.fileName))
  );
  return served;
}

import { err, ok, type Result } from "@/utils";

const NON_SLUG_RUN = /[^a-z\d]+/g;
const EDGE_DASHES = /^-+|-+$/g;

/**
 * Lowercases `text`, collapses every run of characters outside [a-z0-9] into
 * one "-" and trims dashes from both ends. Non-ASCII letters count as separators.
 */
export function slugify(text: string): Result<string, string> {
  if (text === "") {
    return err("empty string not permitted");
  }

  const slug = text
    .toLowerCase()
    .replace(NON_SLUG_RUN, "-")
    .replace(EDGE_DASHES, "");

  if (slug.length === 0) {
    return err("slug is empty after removing unsupported characters");
  }

  return ok(slug);
}

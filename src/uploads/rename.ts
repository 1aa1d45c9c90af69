import { extname } from "node:path";
import z from "zod";

export const RENAME_POLICIES = [
  "keepOriginal",
  "randomName",
  "normalizeKeepCase",
  "normalizeLowercase",
] as const;

export type RenamePolicy = (typeof RENAME_POLICIES)[number];

/** Length of the base name generated by the randomName policy */
export const RANDOM_NAME_LENGTH = 32;

const renamePolicySchema = z.enum(RENAME_POLICIES).catch("keepOriginal");

/** Narrows an arbitrary value to a policy; anything unrecognized keeps the original name */
export function resolveRenamePolicy(value: unknown): RenamePolicy {
  return renamePolicySchema.parse(value);
}

const PATH_SEPARATORS = /[\\/]/;
const UNSAFE_RUN = /[^a-zA-Z\-\d]+/g;
const EDGE_UNDERSCORES = /^_+|_+$/g;

/** Final path segment of a client supplied name, whichever separator it used */
export function baseFileName(originalName: string): string {
  return originalName.split(PATH_SEPARATORS).pop() ?? "";
}

function normalizeBase(base: string): string {
  return base.replace(UNSAFE_RUN, "_").replace(EDGE_UNDERSCORES, "");
}

/**
 * Derives the on-disk name for an uploaded part.
 * The extension is kept verbatim; only the base name is transformed.
 * A normalized base that ends up empty is replaced by a random one.
 */
export function storedNameFor(
  originalName: string,
  policy: RenamePolicy,
  random: (length: number) => string
): string {
  const fileName = baseFileName(originalName);
  const ext = extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);

  switch (policy) {
    case "randomName":
      return `${random(RANDOM_NAME_LENGTH)}${ext}`;
    case "normalizeKeepCase": {
      const normalized = normalizeBase(base);
      return `${normalized || random(RANDOM_NAME_LENGTH)}${ext}`;
    }
    case "normalizeLowercase": {
      const normalized = normalizeBase(base.toLowerCase());
      return `${normalized || random(RANDOM_NAME_LENGTH)}${ext}`;
    }
    default:
      return fileName;
  }
}

import { customAlphabet } from "nanoid";
import type { ToolkitLogger } from "@/logging";
import { describeError, safeTrySync } from "@/utils";

/** 64 symbols, so nanoid's bit mask maps every random byte to one index */
export const RANDOM_STRING_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-_";

const generate = customAlphabet(RANDOM_STRING_ALPHABET);

/** Characters per nanoid call; its pool of 128 bytes per character must stay within one getRandomValues call */
export const MAX_CHUNK_LENGTH = 256;

function generateChunked(length: number): string {
  let out = "";
  while (out.length < length) {
    out += generate(Math.min(length - out.length, MAX_CHUNK_LENGTH));
  }
  return out;
}

export interface RandomStringOptions {
  logger?: ToolkitLogger;
}

/**
 * Returns `length` characters drawn uniformly from RANDOM_STRING_ALPHABET
 * using the platform's cryptographic random source.
 *
 * @throws {RangeError} When length is negative or not an integer
 * @throws {Error} When the random source fails; the failure is logged first
 */
export function randomString(
  length: number,
  options: RandomStringOptions = {}
): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(
      `random string length must be a non-negative integer, got ${length}`
    );
  }
  if (length === 0) {
    return "";
  }

  const result = safeTrySync(() => generateChunked(length));
  if (result.isErr) {
    const message = `random source failed: ${describeError(result.error)}`;
    options.logger?.error({
      atFunction: "randomString",
      message,
      data: { length },
    });
    throw new Error(message, { cause: result.error });
  }

  return result.value;
}

import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ToolkitLogger } from "@/logging";
import { ensureDirectory } from "../ensure-directory";

const makeLogger = (): ToolkitLogger => ({
  info: vi.fn(() => "info-id"),
  warn: vi.fn(() => "warn-id"),
  error: vi.fn(() => "error-1"),
});

describe("ensureDirectory", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(process.cwd(), ".tmp-dirs-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("creates missing parents", async () => {
    const target = join(root, "a", "b", "c");
    const result = await ensureDirectory(target);

    expect(result.isOk).toBe(true);
    expect(result.value).toBe(target);
    expect(statSync(target).isDirectory()).toBe(true);
  });

  it("succeeds twice on the same path", async () => {
    const target = join(root, "uploads");

    const first = await ensureDirectory(target);
    const second = await ensureDirectory(target);

    expect(first.isOk).toBe(true);
    expect(second.isOk).toBe(true);
    expect(existsSync(target)).toBe(true);
  });

  it("fails when a file occupies the path", async () => {
    const target = join(root, "taken");
    writeFileSync(target, "not a directory");
    const logger = makeLogger();

    const result = await ensureDirectory(target, { logger });

    expect(result.isErr).toBe(true);
    expect(result.error).toBe(
      `[error-1] path exists and is not a directory: ${target}`
    );
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("reports creation failures beneath a file", async () => {
    const blocker = join(root, "blocker");
    writeFileSync(blocker, "file");
    const logger = makeLogger();

    const result = await ensureDirectory(join(blocker, "child"), { logger });

    expect(result.isErr).toBe(true);
    expect(result.error?.startsWith("[error-1] could not")).toBe(true);
  });
});

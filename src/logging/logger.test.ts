import { existsSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import {
  createLog,
  createLogger,
  formatChunkName,
  getLogMode,
  resolveLogPath,
} from "./index";

const logDir = join(process.cwd(), "logs");
const testAppName = "toolkit-logger-test";
const logFile = join(logDir, `${testAppName}.log`);

const chunkedApp = "toolkit-logger-chunked";
const chunkedAppDir = join(logDir, chunkedApp);

const WEEKLY_CHUNK_PATTERN = /\d{4}-W\d{2}\.log$/;

const readLastRecord = (path: string) => {
  const lines = readFileSync(path, "utf-8").trim().split("\n");
  return JSON.parse(lines.at(-1) ?? "");
};

beforeAll(() => {
  if (existsSync(logFile)) {
    rmSync(logFile);
  }
  if (existsSync(chunkedAppDir)) {
    rmSync(chunkedAppDir, { recursive: true });
  }
});

afterAll(() => {
  if (existsSync(chunkedAppDir)) {
    rmSync(chunkedAppDir, { recursive: true });
  }
});

describe("createLog", () => {
  it("appends a structured record and returns its id", () => {
    const log_id = createLog({
      appName: testAppName,
      atFunction: "uploadFiles",
      message: "stored file",
      data: { storedName: "cat.png" },
      level: "info",
    });

    expect(log_id).toHaveLength(6);

    const last = readLastRecord(logFile);
    expect(last.log_id).toBe(log_id);
    expect(last.atFunction).toBe("uploadFiles");
    expect(last.message).toBe("stored file");
    expect(last.level).toBe("info");
    expect(last.data).toEqual({ storedName: "cat.png" });
  });

  it("keeps a caller supplied log id", () => {
    const log_id = createLog({
      appName: testAppName,
      atFunction: "fixedId",
      message: "with id",
      log_id: "abc123",
    });

    expect(log_id).toBe("abc123");
    expect(readLastRecord(logFile).data).toBeNull();
  });

  it("throws when appName is missing", () => {
    expect(() =>
      createLog({ appName: "", atFunction: "x", message: "no app" })
    ).toThrow("Missing appName");
  });
});

describe("createLogger", () => {
  it("binds the app name and level", () => {
    const logger = createLogger(testAppName);
    const log_id = logger.warn({
      atFunction: "readJSON",
      message: "body too large",
      data: { limit: 10 },
    });

    const last = readLastRecord(logFile);
    expect(last.log_id).toBe(log_id);
    expect(last.appName).toBe(testAppName);
    expect(last.level).toBe("warn");
    expect(last.data.limit).toBe(10);
  });

  it("writes to chunked files when configured", () => {
    const logger = createLogger(chunkedApp, { chunking: "weekly" });
    logger.error({ atFunction: "weekly", message: "weekly error" });

    const path = resolveLogPath(chunkedApp, { chunking: "weekly" });
    expect(path.startsWith(chunkedAppDir)).toBe(true);
    expect(path).toMatch(WEEKLY_CHUNK_PATTERN);

    const last = readLastRecord(path);
    expect(last.level).toBe("error");
    expect(last.message).toBe("weekly error");
  });
});

describe("resolveLogPath", () => {
  it("returns the flat file path without chunking", () => {
    expect(resolveLogPath("myApp")).toBe(join(logDir, "myApp.log"));
  });

  it("returns a dated path for daily chunking", () => {
    const now = new Date();
    const month = String(now.getMonth() + 1).padStart(2, "0");
    const day = String(now.getDate()).padStart(2, "0");
    expect(resolveLogPath(chunkedApp, { chunking: "daily" })).toBe(
      join(chunkedAppDir, `${now.getFullYear()}-${month}-${day}.log`)
    );
  });
});

describe("formatChunkName", () => {
  it("formats monthly chunk names", () => {
    expect(formatChunkName(new Date(2026, 1, 15), "monthly")).toBe("2026-02");
  });

  it("formats daily chunk names", () => {
    expect(formatChunkName(new Date(2026, 1, 5), "daily")).toBe("2026-02-05");
  });

  it("formats weekly chunk names with the ISO week", () => {
    // Monday Jan 5, 2026 is in ISO week 2
    expect(formatChunkName(new Date(2026, 0, 5), "weekly")).toBe("2026-W02");
  });
});

describe("getLogMode", () => {
  const original = process.env.LOG_MODE;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.LOG_MODE;
    } else {
      process.env.LOG_MODE = original;
    }
  });

  it("defaults to dev", () => {
    delete process.env.LOG_MODE;
    expect(getLogMode()).toBe("dev");
  });

  it("rejects unknown modes", () => {
    process.env.LOG_MODE = "verbose";
    expect(() => getLogMode()).toThrow('Invalid LOG_MODE "verbose"');
  });
});

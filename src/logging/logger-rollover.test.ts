import { existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLog } from "./index";

interface FakeTransport {
  destination: string;
  end: () => void;
}

interface TransportOptions {
  targets: Array<{ options: { destination: string } }>;
}

const state = vi.hoisted(() => {
  const transports: FakeTransport[] = [];
  return { transports };
});

vi.mock("pino", () => {
  const pino = Object.assign(
    () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
    {
      transport: (options: TransportOptions) => {
        const transport: FakeTransport = {
          destination: options.targets[0]?.options.destination ?? "",
          end: vi.fn(),
        };
        state.transports.push(transport);
        return transport;
      },
    }
  );
  return { default: pino };
});

const appName = "toolkit-rollover-test";
const appDir = join(process.cwd(), "logs", appName);

describe("createLog in prod mode", () => {
  const env = { ...process.env };

  beforeEach(() => {
    process.env.NODE_ENV = "production";
    process.env.LOG_MODE = "prod";
    vi.useFakeTimers();
    state.transports.length = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
    process.env.NODE_ENV = env.NODE_ENV;
    if (env.LOG_MODE === undefined) {
      delete process.env.LOG_MODE;
    } else {
      process.env.LOG_MODE = env.LOG_MODE;
    }
  });

  afterAll(() => {
    if (existsSync(appDir)) {
      rmSync(appDir, { recursive: true });
    }
  });

  it("reuses one transport per chunk and ends it when the chunk rolls over", () => {
    const log = { appName, atFunction: "rollover", message: "tick" };

    vi.setSystemTime(new Date(2026, 0, 5, 12));
    createLog(log, { chunking: "daily" });
    createLog(log, { chunking: "daily" });
    expect(state.transports).toHaveLength(1);

    vi.setSystemTime(new Date(2026, 0, 6, 12));
    createLog(log, { chunking: "daily" });

    expect(state.transports.map((t) => t.destination)).toEqual([
      join(appDir, "2026-01-05.log"),
      join(appDir, "2026-01-06.log"),
    ]);
    expect(state.transports[0]?.end).toHaveBeenCalledOnce();
    expect(state.transports[1]?.end).not.toHaveBeenCalled();
  });
});

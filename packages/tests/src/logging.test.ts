import { describe, it, expect, vi, afterEach } from "vitest";
import { Effect, LogLevel } from "effect";
import { captureLogging, formatLogMessage, loggingLayer, parseLogLevel, type CapturedLine } from "@lockstep/effect-runtime";
import { run } from "./helpers.js";

describe("logging", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats logged values", () => {
    expect(formatLogMessage("plain")).toBe("plain");
    expect(formatLogMessage(["saved", 3, { epoch: 2 }])).toBe('saved 3 {"epoch":2}');
  });

  it("parses level names, defaulting to info", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.Debug);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warning);
    expect(parseLogLevel("loud")).toBe(LogLevel.Info);
  });

  it("prints lines at or above the minimum level", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await run(
      Effect.gen(function* () {
        yield* Effect.logInfo("hidden");
        yield* Effect.logWarning("shown");
      }),
      loggingLayer(LogLevel.Warning),
    );
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] WARN {2}shown$/);
  });

  it("captures every level down to debug", async () => {
    const lines: CapturedLine[] = [];
    await run(
      Effect.gen(function* () {
        yield* Effect.logDebug("d");
        yield* Effect.logError("e");
      }),
      captureLogging(lines),
    );
    expect(lines).toEqual([
      { level: "DEBUG", message: "d" },
      { level: "ERROR", message: "e" },
    ]);
  });
});

import { describe, it, expect } from "vitest";
import { Effect, LogLevel } from "effect";
import { LoggingLive, formatLogLine, parseLogLevel } from "@verity/effect-runtime";

describe("formatLogLine", () => {
  const date = new Date("2024-01-02T03:04:05.678Z");

  it("prints time, padded level and message", () => {
    expect(formatLogLine(LogLevel.Info, "hello", date)).toBe("[03:04:05.678] INFO  hello");
    expect(formatLogLine(LogLevel.Error, "boom", date)).toBe("[03:04:05.678] ERROR boom");
  });

  it("joins multi-part messages and appends annotations", () => {
    expect(formatLogLine(LogLevel.Debug, ["cost", 0.5], date, [["run", "a"], ["step", 3]]))
      .toBe("[03:04:05.678] DEBUG cost 0.5 run=a step=3");
  });
});

describe("parseLogLevel", () => {
  it("maps names to levels", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.Debug);
    expect(parseLogLevel("WARNING")).toBe(LogLevel.Warning);
    expect(parseLogLevel("warn")).toBe(LogLevel.Warning);
    expect(parseLogLevel("error")).toBe(LogLevel.Error);
    expect(parseLogLevel("none")).toBe(LogLevel.None);
  });

  it("falls back to info", () => {
    expect(parseLogLevel("chatty")).toBe(LogLevel.Info);
  });
});

describe("LoggingLive", () => {
  it("routes entries at or above the minimum level to the sink", async () => {
    const lines: string[] = [];
    const program = Effect.logDebug("hidden").pipe(
      Effect.zipRight(Effect.log("shown")),
      Effect.zipRight(Effect.logWarning("careful")),
    );
    await Effect.runPromise(program.pipe(Effect.provide(LoggingLive("info", (line) => lines.push(line)))));

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO  shown$/);
    expect(lines[1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] WARN  careful$/);
  });
});

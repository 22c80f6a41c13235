import { describe, expect, it } from "vitest";

import { ConsoleLogger, formatLogEventLine, stringifyForDebug } from "./logger.js";

function buildLogger(debug: boolean): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new ConsoleLogger({
    debug,
    write: (line) => lines.push(line),
    now: () => new Date("2024-06-01T00:00:00Z"),
  });
  return { logger, lines };
}

describe("ConsoleLogger", () => {
  it("prefixes progress lines with a timestamp", () => {
    const { logger, lines } = buildLogger(false);

    logger.log("Running task");

    expect(lines).toEqual(["2024-06-01T00:00:00.000Z Running task"]);
  });

  it("drops debug lines unless debug is enabled", () => {
    const quiet = buildLogger(false);
    quiet.logger.debug("run task input {}");
    expect(quiet.lines).toEqual([]);

    const verbose = buildLogger(true);
    verbose.logger.debug("run task input {}");
    expect(verbose.lines).toEqual(["2024-06-01T00:00:00.000Z [DEBUG] run task input {}"]);
  });

  it("relays container output verbatim", () => {
    const { logger, lines } = buildLogger(false);

    logger.output("hello from the container");

    expect(lines).toEqual(["hello from the container"]);
  });
});

describe("formatLogEventLine", () => {
  it("renders the event time and trims trailing whitespace", () => {
    expect(formatLogEventLine(Date.UTC(2024, 5, 1, 0, 0, 5), "started\n")).toBe(
      "2024-06-01T00:00:05.000Z started",
    );
  });

  it("uses a placeholder when the event has no timestamp", () => {
    expect(formatLogEventLine(undefined, "no time")).toBe("- no time");
  });
});

describe("stringifyForDebug", () => {
  it("serializes dates as ISO strings", () => {
    expect(stringifyForDebug({ at: new Date("2024-06-01T00:00:00Z") })).toBe(
      '{"at":"2024-06-01T00:00:00.000Z"}',
    );
  });

  it("falls back to String for values JSON cannot represent", () => {
    expect(stringifyForDebug(undefined)).toBe("undefined");
  });
});

import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";

import {
  buildRunRequest,
  parseCount,
  parsePropagateTags,
  parseRevision,
  parseWaitUntil,
} from "./run-options.js";

describe("run option parsers", () => {
  it("accepts positive counts only", () => {
    expect(parseCount("3")).toBe(3);
    expect(() => parseCount("0")).toThrow(InvalidArgumentError);
    expect(() => parseCount("1.5")).toThrow("Expected a positive integer.");
  });

  it("accepts zero as an unspecified revision", () => {
    expect(parseRevision("0")).toBe(0);
    expect(() => parseRevision("-1")).toThrow("Expected a non-negative integer.");
  });

  it("limits wait-until to running or stopped", () => {
    expect(parseWaitUntil("running")).toBe("running");
    expect(() => parseWaitUntil("started")).toThrow("Expected running or stopped.");
  });

  it("maps propagation modes to variants", () => {
    expect(parsePropagateTags("")).toEqual({ kind: "none" });
    expect(parsePropagateTags("SERVICE")).toEqual({ kind: "from-service" });
    expect(parsePropagateTags("TASK_DEFINITION")).toEqual({
      kind: "native",
      value: "TASK_DEFINITION",
    });
  });

  it("passes any other propagation mode through unchanged", () => {
    expect(parsePropagateTags("CUSTOM_MODE")).toEqual({ kind: "native", value: "CUSTOM_MODE" });
    expect(parsePropagateTags("service")).toEqual({ kind: "native", value: "service" });
  });
});

describe("buildRunRequest", () => {
  it("defaults to registering and waiting until stopped", () => {
    expect(buildRunRequest({})).toEqual({
      reference: { kind: "register", taskDefinitionPath: undefined },
      overrides: { kind: "none" },
      count: 1,
      tags: undefined,
      propagateTags: { kind: "none" },
      dryRun: false,
      noWait: false,
      waitUntil: "stopped",
      watchContainer: undefined,
    });
  });

  it("carries the revision into skip mode", () => {
    const request = buildRunRequest({ skipTaskDefinition: true, revision: 4 });
    expect(request.reference).toEqual({ kind: "skip", revision: 4 });
  });

  it("resolves latest mode without a revision", () => {
    const request = buildRunRequest({ latestTaskDefinition: true });
    expect(request.reference).toEqual({ kind: "latest", revision: undefined });
  });

  it("prefers inline overrides over a file", () => {
    const request = buildRunRequest({
      overrides: '{"cpu":"512"}',
      overridesFile: "overrides.json",
    });
    expect(request.overrides).toEqual({ kind: "inline", json: '{"cpu":"512"}' });
  });

  it("maps --no-wait to noWait", () => {
    expect(buildRunRequest({ wait: false }).noWait).toBe(true);
    expect(buildRunRequest({ wait: true }).noWait).toBe(false);
  });
});

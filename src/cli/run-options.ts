import { PropagateTags } from "@aws-sdk/client-ecs";
import { InvalidArgumentError } from "commander";

import type {
  OverrideSource,
  ReferenceMode,
  RunRequest,
  TagPropagation,
  WaitUntil,
} from "../app/orchestrator/run/types.js";

// =============================================================================
// TYPES
// =============================================================================

/** `deckhand run` options as commander hands them to the action. */
export type RunCliOptions = {
  taskDef?: string;
  revision?: number;
  skipTaskDefinition?: boolean;
  latestTaskDefinition?: boolean;
  dryRun?: boolean;
  wait?: boolean;
  waitUntil?: WaitUntil;
  overrides?: string;
  overridesFile?: string;
  count?: number;
  tags?: string;
  propagateTags?: TagPropagation;
  watchContainer?: string;
};

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseRevision(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function parseWaitUntil(value: string): WaitUntil {
  if (value === "running" || value === "stopped") {
    return value;
  }
  throw new InvalidArgumentError("Expected running or stopped.");
}

export function parsePropagateTags(value: string): TagPropagation {
  if (value === "") {
    return { kind: "none" };
  }
  if (value === PropagateTags.SERVICE) {
    return { kind: "from-service" };
  }
  return { kind: "native", value };
}

// =============================================================================
// REQUEST
// =============================================================================

export function buildRunRequest(opts: RunCliOptions): RunRequest {
  return {
    reference: resolveReferenceMode(opts),
    overrides: resolveOverrideSource(opts),
    count: opts.count ?? 1,
    tags: opts.tags,
    propagateTags: opts.propagateTags ?? { kind: "none" },
    dryRun: opts.dryRun ?? false,
    noWait: opts.wait === false,
    waitUntil: opts.waitUntil ?? "stopped",
    watchContainer: opts.watchContainer,
  };
}

function resolveReferenceMode(opts: RunCliOptions): ReferenceMode {
  if (opts.skipTaskDefinition) {
    return { kind: "skip", revision: opts.revision };
  }
  if (opts.latestTaskDefinition) {
    return { kind: "latest", revision: opts.revision };
  }
  return { kind: "register", taskDefinitionPath: opts.taskDef };
}

function resolveOverrideSource(opts: RunCliOptions): OverrideSource {
  // Inline JSON wins over a file.
  if (opts.overrides) {
    return { kind: "inline", json: opts.overrides };
  }
  if (opts.overridesFile) {
    return { kind: "file", path: opts.overridesFile };
  }
  return { kind: "none" };
}

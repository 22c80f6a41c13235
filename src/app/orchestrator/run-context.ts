/**
 * RunContext carries everything one `run` invocation needs.
 * Purpose: replace ambient client/config state with an explicit value.
 * Usage: const ctx = createRunContext({ config, controlPlane, logger, signal }).
 */

import { setTimeout as sleep } from "node:timers/promises";

import type { DeployConfig } from "../../core/config.js";
import { createFileDefinitionSource, type DefinitionSource } from "../../core/definitions.js";
import type { Logger } from "../../core/logger.js";

import type { Clock, ControlPlane } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ObserveTimings = {
  /** Time for the awslogs driver to create the stream before the first fetch. */
  logGraceMs: number;
  logPollIntervalMs: number;
  waitDelayMs: number;
};

export const DEFAULT_OBSERVE_TIMINGS: ObserveTimings = {
  logGraceMs: 3_000,
  logPollIntervalMs: 5_000,
  waitDelayMs: 6_000,
};

export type RunContext = {
  cluster: string;
  service?: string;
  taskDefinitionPath: string;
  serviceDefinitionPath?: string;
  timeoutMs: number;
  timings: ObserveTimings;
  controlPlane: ControlPlane;
  definitions: DefinitionSource;
  logger: Logger;
  clock: Clock;
  signal?: AbortSignal;
};

export type CreateRunContextInput = {
  config: DeployConfig;
  controlPlane: ControlPlane;
  logger: Logger;
  definitions?: DefinitionSource;
  clock?: Clock;
  timings?: Partial<ObserveTimings>;
  signal?: AbortSignal;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: async (ms, signal) => {
    await sleep(ms, undefined, { signal });
  },
};

export function createRunContext(input: CreateRunContextInput): RunContext {
  const { config } = input;

  return {
    cluster: config.cluster,
    service: config.service,
    taskDefinitionPath: config.task_definition,
    serviceDefinitionPath: config.service_definition,
    timeoutMs: config.timeout_seconds * 1000,
    timings: { ...DEFAULT_OBSERVE_TIMINGS, ...input.timings },
    controlPlane: input.controlPlane,
    definitions: input.definitions ?? createFileDefinitionSource(),
    logger: input.logger,
    clock: input.clock ?? systemClock,
    signal: input.signal,
  };
}

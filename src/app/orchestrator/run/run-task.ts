import type { TaskDefinition, TaskOverride } from "@aws-sdk/client-ecs";

import { parseOverrides } from "../../../core/definitions.js";
import {
  DefinitionError,
  ResolutionError,
  SubmissionError,
  WaitError,
  wrapError,
} from "../../../core/errors.js";
import { stringifyForDebug } from "../../../core/logger.js";
import type { RunContext } from "../run-context.js";

import { observeTask } from "./observe.js";
import { submitTask } from "./submit.js";
import { resolveTaskReference } from "./task-reference.js";
import { inspectTaskStatus } from "./task-status.js";
import {
  describeTaskReference,
  type OverrideSource,
  type RunRequest,
  type TaskHandle,
} from "./types.js";
import { selectWatchContainer } from "./watch-target.js";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Resolve, submit and follow one ad-hoc task.
 *
 * Dry-run returns once the reference is resolved, no-wait once the task is
 * submitted; otherwise the task must reach `request.waitUntil` and pass the
 * final status inspection.
 */
export async function runTask(context: RunContext, request: RunRequest): Promise<void> {
  const { logger } = context;
  logger.log(`Running task${request.dryRun ? " (DRY RUN)" : ""}`);

  const overrides = await resolveOverrides(context, request.overrides);
  logger.debug(`Overrides: ${stringifyForDebug(overrides)}`);

  const reference = await resolveTaskReference(context, request);
  logger.log(`Task definition ARN: ${describeTaskReference(reference)}`);
  if (request.dryRun) {
    logger.log("DRY RUN OK");
    return;
  }
  if (reference.kind !== "live") {
    throw new ResolutionError(`task definition ${reference.family} was not registered`);
  }

  const td = await describeTaskDefinition(context, reference.arn);
  const watchContainer = selectWatchContainer(td, request.watchContainer);
  logger.log(`Watch container: ${watchContainer.name}`);

  const startedAt = context.clock.now();
  let handle: TaskHandle;
  try {
    handle = await submitTask(context, reference.arn, overrides, request);
  } catch (err) {
    throw wrapError(err, "failed to run task", SubmissionError);
  }

  if (request.noWait) {
    logger.log("Run task invoked");
    return;
  }

  try {
    await observeTask(context, handle, watchContainer, startedAt, request.waitUntil);
  } catch (err) {
    throw wrapError(err, "failed to run task", WaitError);
  }

  await inspectTaskStatus(context, handle, watchContainer);
  logger.log("Run task completed!");
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveOverrides(
  context: RunContext,
  source: OverrideSource,
): Promise<TaskOverride> {
  switch (source.kind) {
    case "none":
      return {};

    case "inline":
      try {
        return parseOverrides(source.json);
      } catch (err) {
        throw wrapError(err, "invalid overrides", DefinitionError);
      }

    case "file":
      try {
        return await context.definitions.loadOverrides(source.path);
      } catch (err) {
        throw wrapError(err, `failed to read overrides-file ${source.path}`, DefinitionError);
      }
  }
}

async function describeTaskDefinition(context: RunContext, arn: string): Promise<TaskDefinition> {
  try {
    return await context.controlPlane.describeTaskDefinition(arn);
  } catch (err) {
    throw wrapError(err, `failed to describe task definition ${arn}`, ResolutionError);
  }
}

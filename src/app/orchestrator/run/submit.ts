import type { Tag, TaskOverride } from "@aws-sdk/client-ecs";

import type { ServiceDefinition } from "../../../core/definitions.js";
import { SubmissionError, wrapError } from "../../../core/errors.js";
import { stringifyForDebug } from "../../../core/logger.js";
import { parseTags } from "../../../core/tags.js";
import { arnToName } from "../../../core/utils.js";
import type { RunTaskInput } from "../ports.js";
import type { RunContext } from "../run-context.js";

import type { RunRequest, TaskHandle } from "./types.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function submitTask(
  context: RunContext,
  taskDefinition: string,
  overrides: TaskOverride,
  request: Pick<RunRequest, "count" | "tags" | "propagateTags">,
): Promise<TaskHandle> {
  const { logger } = context;
  logger.log(`Running task with ${taskDefinition}`);

  const service = await loadServiceDefinition(context);
  const input: RunTaskInput = {
    cluster: context.cluster,
    taskDefinition,
    overrides,
    count: request.count,
    tags: parseTags(request.tags),
    launchType: service.launchType,
    networkConfiguration: service.networkConfiguration,
    capacityProviderStrategy: service.capacityProviderStrategy,
    placementConstraints: service.placementConstraints,
    placementStrategy: service.placementStrategy,
    platformVersion: service.platformVersion,
    enableECSManagedTags: service.enableECSManagedTags,
    enableExecuteCommand: service.enableExecuteCommand,
  };

  const propagation = request.propagateTags;
  switch (propagation.kind) {
    case "from-service": {
      // Emulated client-side; ECS only propagates service tags to tasks it starts itself.
      const serviceTags = await listServiceTags(context);
      input.tags = [...(input.tags ?? []), ...serviceTags];
      break;
    }
    case "none":
      break;
    case "native":
      input.propagateTags = propagation.value;
      break;
  }
  logger.debug(`run task input ${stringifyForDebug(input)}`);

  const out = await context.controlPlane.runTask(input, context.signal);

  const failure = out.failures[0];
  if (failure) {
    if (failure.arn) {
      logger.log(`Task ARN: ${failure.arn}`);
    }
    throw new SubmissionError(failure.reason ?? "run task reported a failure without a reason");
  }

  const task = out.tasks[0];
  if (!task?.taskArn) {
    throw new SubmissionError("run task returned no task");
  }

  logger.log(`Task ARN: ${task.taskArn}`);
  return {
    taskArn: task.taskArn,
    taskId: arnToName(task.taskArn),
    cluster: task.clusterArn ?? context.cluster,
    task,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function loadServiceDefinition(context: RunContext): Promise<ServiceDefinition> {
  if (!context.serviceDefinitionPath) {
    return {};
  }
  return context.definitions.loadServiceDefinition(context.serviceDefinitionPath);
}

async function listServiceTags(context: RunContext): Promise<Tag[]> {
  const serviceName = context.service;
  if (!serviceName) {
    throw new SubmissionError("tag propagation from SERVICE requires a service in the config");
  }

  try {
    const service = await context.controlPlane.describeService(context.cluster, serviceName);
    if (!service.serviceArn) {
      throw new SubmissionError(`service ${serviceName} has no ARN`);
    }

    const tags = await context.controlPlane.listTagsForResource(service.serviceArn);
    context.logger.debug(
      `propagate tags from service ${service.serviceArn} ${stringifyForDebug(tags)}`,
    );
    return tags;
  } catch (err) {
    throw wrapError(err, `failed to list tags of service ${serviceName}`, SubmissionError);
  }
}

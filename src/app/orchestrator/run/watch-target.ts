import type { TaskDefinition } from "@aws-sdk/client-ecs";

import { ResolutionError } from "../../../core/errors.js";

import type { LogTarget, TaskHandle, WatchTarget } from "./types.js";

const AWSLOGS_DRIVER = "awslogs";

/** Container whose logs and exit code the run follows; the first one unless named. */
export function selectWatchContainer(td: TaskDefinition, name?: string): WatchTarget {
  const containers = td.containerDefinitions ?? [];
  const match = name ? containers.find((c) => c.name === name) : containers[0];
  const label = td.taskDefinitionArn ?? td.family ?? "task definition";

  if (!match) {
    throw new ResolutionError(
      name
        ? `container ${name} is not defined in ${label}`
        : `${label} has no container definitions`,
    );
  }
  if (!match.name) {
    throw new ResolutionError(`a container definition in ${label} has no name`);
  }

  return { ...match, name: match.name };
}

/**
 * CloudWatch Logs location of the watch container, or null when it does not
 * log through awslogs with a stream prefix.
 */
export function resolveLogTarget(handle: TaskHandle, container: WatchTarget): LogTarget | null {
  const config = container.logConfiguration;
  if (config?.logDriver !== AWSLOGS_DRIVER) return null;

  const prefix = config.options?.["awslogs-stream-prefix"];
  const group = config.options?.["awslogs-group"];
  if (!prefix || !group) return null;

  return {
    logGroupName: group,
    logStreamName: `${prefix}/${container.name}/${handle.taskId}`,
  };
}

import type { Container, Task } from "@aws-sdk/client-ecs";

import { TaskStatusError, wrapError } from "../../../core/errors.js";
import type { RunContext } from "../run-context.js";

import type { TaskHandle, WatchTarget } from "./types.js";

const STOPPED = "STOPPED";

/**
 * Final read-only inspection after the wait. Fails when the task has stopped
 * and the watch container exited non-zero.
 */
export async function inspectTaskStatus(
  context: RunContext,
  handle: TaskHandle,
  watchContainer: WatchTarget,
): Promise<void> {
  const { logger } = context;

  let task: Task | undefined;
  try {
    task = await context.controlPlane.describeTask({
      cluster: handle.cluster,
      taskArn: handle.taskArn,
    });
  } catch (err) {
    throw wrapError(err, `failed to describe task ID ${handle.taskId}`, TaskStatusError);
  }
  if (!task) {
    throw new TaskStatusError(`task ID ${handle.taskId} is not found`);
  }

  logger.log(`Task ID ${handle.taskId} last status: ${task.lastStatus ?? "UNKNOWN"}`);
  if (task.stoppedReason) {
    logger.log(`Stopped reason: ${task.stoppedReason}`);
  }

  const containers = task.containers ?? [];
  for (const container of containers) {
    logger.log(formatContainerStatus(container));
  }

  if (task.lastStatus !== STOPPED) return;

  const watched = containers.find((c) => c.name === watchContainer.name);
  if (watched?.exitCode !== undefined && watched.exitCode !== 0) {
    throw new TaskStatusError(
      `container ${watchContainer.name} exited with code ${watched.exitCode}`,
    );
  }
}

function formatContainerStatus(container: Container): string {
  const parts = [
    `Container: ${container.name ?? "-"}`,
    `LastStatus: ${container.lastStatus ?? "-"}`,
  ];
  if (container.exitCode !== undefined) parts.push(`ExitCode: ${container.exitCode}`);
  if (container.reason) parts.push(`Reason: ${container.reason}`);
  return parts.join(", ");
}

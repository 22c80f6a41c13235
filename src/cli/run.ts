import type { ControlPlane } from "../app/orchestrator/ports.js";
import { createRunContext, type ObserveTimings } from "../app/orchestrator/run-context.js";
import { runTask } from "../app/orchestrator/run/run-task.js";
import { AwsControlPlane } from "../aws/control-plane.js";
import type { DeployConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  DefinitionError,
  ResolutionError,
  SubmissionError,
  TaskStatusError,
  TaskStoppedError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  WaitError,
  WaitTimeoutError,
} from "../core/errors.js";
import { ConsoleLogger, type Logger } from "../core/logger.js";

import { buildRunRequest, type RunCliOptions } from "./run-options.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandRuntime = {
  debug?: boolean;
  logger?: Logger;
  controlPlane?: ControlPlane;
  timings?: Partial<ObserveTimings>;
};

export async function runCommand(
  config: DeployConfig,
  opts: RunCliOptions,
  runtime: RunCommandRuntime = {},
): Promise<void> {
  const logger = runtime.logger ?? new ConsoleLogger({ debug: runtime.debug });
  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => {
      logger.log(
        `Received ${signal}. Stopping the run; the task is not stopped in ${config.cluster}.`,
      );
    },
  });

  try {
    const request = buildRunRequest(opts);
    const context = createRunContext({
      config,
      controlPlane: runtime.controlPlane ?? new AwsControlPlane({ region: config.region }),
      logger,
      timings: runtime.timings,
      signal: stopHandler.signal,
    });

    await runTask(context, request);
  } catch (error) {
    throw normalizeRunCommandError(error, { interrupted: stopHandler.isStopped() });
  } finally {
    stopHandler.cleanup();
  }
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_INTERRUPTED_TITLE = "Run command interrupted.";
const RUN_COMMAND_DEFINITION_HINT =
  "Fix the definition file or the --overrides JSON and rerun.";
const RUN_COMMAND_RESOLUTION_HINT =
  "Check the task definition family and --revision, or omit --skip-task-definition to register one.";
const RUN_COMMAND_SUBMISSION_HINT =
  "Check cluster capacity and the network settings in the service definition.";
const RUN_COMMAND_TIMEOUT_HINT =
  "Raise timeout_seconds in deckhand.yaml, or pass --no-wait to return after submission.";
const RUN_COMMAND_STOPPED_HINT =
  "Check the stopped reason of the task; it stopped before it was running.";
const RUN_COMMAND_TASK_HINT = "Check the container logs for the failing command.";
const RUN_COMMAND_LEFT_RUNNING_NEXT = "The task may still be running in the cluster.";

type RunCommandErrorContext = {
  interrupted: boolean;
};

export function normalizeRunCommandError(
  error: unknown,
  context: RunCommandErrorContext,
): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  const taskMayBeLive = context.interrupted || error instanceof WaitError;
  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: context.interrupted ? RUN_COMMAND_INTERRUPTED_TITLE : RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: context.interrupted ? undefined : resolveRunCommandHint(error),
    next: taskMayBeLive ? RUN_COMMAND_LEFT_RUNNING_NEXT : undefined,
    cause: error,
  });
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof WaitTimeoutError) return RUN_COMMAND_TIMEOUT_HINT;
  if (error instanceof TaskStoppedError) return RUN_COMMAND_STOPPED_HINT;
  if (error instanceof DefinitionError) return RUN_COMMAND_DEFINITION_HINT;
  if (error instanceof ResolutionError) return RUN_COMMAND_RESOLUTION_HINT;
  if (error instanceof SubmissionError) return RUN_COMMAND_SUBMISSION_HINT;
  if (error instanceof TaskStatusError) return RUN_COMMAND_TASK_HINT;
  return undefined;
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof DefinitionError) return USER_FACING_ERROR_CODES.definition;
  if (error instanceof ResolutionError) return USER_FACING_ERROR_CODES.resolution;
  if (error instanceof SubmissionError) return USER_FACING_ERROR_CODES.submission;
  if (error instanceof WaitError) return USER_FACING_ERROR_CODES.wait;
  if (error instanceof TaskStatusError) return USER_FACING_ERROR_CODES.task;
  return USER_FACING_ERROR_CODES.unknown;
}

/*
Waits for a submitted task to reach its target state, tailing the watch container's
CloudWatch Logs alongside when the container logs through awslogs.
The log loop is best-effort: fetch errors are logged at debug level and never fail the wait,
and the loop is cancelled as soon as the wait settles whether or not it has caught up.
*/

import { formatErrorMessage } from "../../../core/error-format.js";
import { WaitError, wrapError } from "../../../core/errors.js";
import { formatLogEventLine } from "../../../core/logger.js";
import type { RunContext } from "../run-context.js";

import type { LogCursor, LogTarget, TaskHandle, WaitUntil, WatchTarget } from "./types.js";
import { buildWaitPolicy } from "./wait-policy.js";
import { resolveLogTarget } from "./watch-target.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function observeTask(
  context: RunContext,
  handle: TaskHandle,
  watchContainer: WatchTarget,
  startedAt: Date,
  waitUntil: WaitUntil,
): Promise<void> {
  const { logger } = context;
  logger.log("Waiting for run task...(it may take a while)");

  const logTarget = resolveLogTarget(handle, watchContainer);
  if (!logTarget) {
    logger.log("awslogs not configured");
    await waitForTask(context, handle, waitUntil);
    return;
  }

  logger.log(`Watching container: ${watchContainer.name}`);
  await context.clock.sleep(context.timings.logGraceMs, context.signal);

  const tail = new AbortController();
  const unlink = linkAbortSignal(context.signal, tail);
  const tailing = tailLogs(context, logTarget, startedAt, tail.signal);

  try {
    await waitForTask(context, handle, waitUntil);
  } finally {
    tail.abort();
    unlink();
    await tailing;
  }
}

export async function waitForTask(
  context: RunContext,
  handle: TaskHandle,
  waitUntil: WaitUntil,
): Promise<void> {
  const { logger, controlPlane } = context;
  const target = { cluster: handle.cluster, taskArn: handle.taskArn };
  const policy = buildWaitPolicy(context);

  try {
    switch (waitUntil) {
      case "running":
        logger.log(`Waiting for task ID ${handle.taskId} until running`);
        await controlPlane.waitUntilRunning(target, policy);
        logger.log(`Task ID ${handle.taskId} is running`);
        return;

      case "stopped":
        logger.log(`Waiting for task ID ${handle.taskId} until stopped`);
        await controlPlane.waitUntilStopped(target, policy);
        logger.log(`Task ID ${handle.taskId} is stopped`);
        return;
    }
  } catch (err) {
    throw wrapError(err, `failed to wait for task ID ${handle.taskId}`, WaitError);
  }
}

// =============================================================================
// LOG TAILING
// =============================================================================

async function tailLogs(
  context: RunContext,
  target: LogTarget,
  startedAt: Date,
  signal: AbortSignal,
): Promise<void> {
  const { logger, controlPlane, clock } = context;
  const cursor: LogCursor = { startTime: startedAt.getTime() };

  while (!signal.aborted) {
    try {
      await clock.sleep(context.timings.logPollIntervalMs, signal);
    } catch (err) {
      if (!signal.aborted) {
        logger.debug(`log tailing stopped: ${formatErrorMessage(err)}`);
      }
      return;
    }

    try {
      const page = await controlPlane.getLogEvents({
        ...target,
        startTime: cursor.startTime,
        nextToken: cursor.nextToken,
        signal,
      });
      for (const event of page.events) {
        logger.output(formatLogEventLine(event.timestamp, event.message ?? ""));
      }
      if (page.nextForwardToken) {
        cursor.nextToken = page.nextForwardToken;
      }
    } catch (err) {
      if (signal.aborted) return;
      logger.debug(
        `failed to fetch log events from ${target.logStreamName}: ${formatErrorMessage(err)}`,
      );
    }
  }
}

function linkAbortSignal(
  upstream: AbortSignal | undefined,
  controller: AbortController,
): () => void {
  if (!upstream) {
    return () => undefined;
  }

  const onAbort = (): void => controller.abort(upstream.reason);
  if (upstream.aborted) {
    onAbort();
  } else {
    upstream.addEventListener("abort", onAbort, { once: true });
  }

  return () => upstream.removeEventListener("abort", onAbort);
}

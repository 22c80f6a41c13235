import { describe, expect, it } from "vitest";

import { TaskStoppedError, WaitTimeoutError } from "../../../core/errors.js";
import {
  FakeClock,
  FakeControlPlane,
  TASK_ARN,
  buildAwslogsTaskDefinition,
  buildTestRunContext,
} from "../__tests__/fakes.js";

import { observeTask, waitForTask } from "./observe.js";
import type { TaskHandle } from "./types.js";
import { selectWatchContainer } from "./watch-target.js";

const handle: TaskHandle = {
  taskArn: TASK_ARN,
  taskId: "0123abcd",
  cluster: "default",
  task: { taskArn: TASK_ARN },
};

const td = buildAwslogsTaskDefinition("app", 4);
const STARTED_AT = new Date("2026-01-01T00:00:00.000Z");

async function turnUntil(predicate: () => boolean): Promise<void> {
  for (let turns = 0; turns < 1000 && !predicate(); turns += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

describe("observeTask", () => {
  it("waits without tailing when awslogs is not configured", async () => {
    const context = buildTestRunContext();

    await observeTask(context, handle, selectWatchContainer(td, "sidecar"), STARTED_AT, "running");

    expect(context.controlPlane.getLogEventsCalls).toEqual([]);
    expect(context.controlPlane.waitRunningCalls).toHaveLength(1);
    expect(context.controlPlane.waitRunningCalls[0]?.policy).toMatchObject({
      delayMs: 6_000,
      maxAttempts: 101,
    });
    expect(context.logger.messages()).toEqual([
      "Waiting for run task...(it may take a while)",
      "awslogs not configured",
      "Waiting for task ID 0123abcd until running",
      "Task ID 0123abcd is running",
    ]);
  });

  it("relays container log events while waiting", async () => {
    const controlPlane = new FakeControlPlane();
    controlPlane.holdWaitUntilLogsDrained = true;
    controlPlane.logPages = [
      {
        events: [{ timestamp: Date.parse("2026-01-01T00:00:01.000Z"), message: "starting\n" }],
        nextForwardToken: "f/1",
      },
      {
        events: [{ timestamp: Date.parse("2026-01-01T00:00:02.000Z"), message: "done" }],
        nextForwardToken: "f/2",
      },
    ];
    const clock = new FakeClock();
    const context = buildTestRunContext({ controlPlane, clock });

    await observeTask(context, handle, selectWatchContainer(td), STARTED_AT, "stopped");

    expect(context.logger.messages("output")).toEqual([
      "2026-01-01T00:00:01.000Z starting",
      "2026-01-01T00:00:02.000Z done",
    ]);

    const [first, second] = controlPlane.getLogEventsCalls;
    expect(first).toMatchObject({
      logGroupName: "/ecs/app",
      logStreamName: "batch/app/0123abcd",
      startTime: STARTED_AT.getTime(),
      nextToken: undefined,
    });
    expect(second?.nextToken).toBe("f/1");
    expect(clock.sleeps[0]).toBe(3_000);
    expect(clock.sleeps.slice(1).every((ms) => ms === 5_000)).toBe(true);
    expect(controlPlane.waitStoppedCalls).toHaveLength(1);
    expect(context.logger.messages()).toContain("Watching container: app");
    expect(context.logger.messages()).toContain("Task ID 0123abcd is stopped");
  });

  it("reports a task that stopped before running, not a timeout", async () => {
    const controlPlane = new FakeControlPlane();
    controlPlane.waitRunningError = new TaskStoppedError("task ID 0123abcd stopped before it was running");
    const context = buildTestRunContext({ controlPlane });

    const result = observeTask(context, handle, selectWatchContainer(td), STARTED_AT, "running");

    await expect(result).rejects.toBeInstanceOf(TaskStoppedError);
    await expect(result).rejects.toThrow(
      "failed to wait for task ID 0123abcd: task ID 0123abcd stopped before it was running",
    );
  });

  it("keeps log fetch failures out of the wait result", async () => {
    const controlPlane = new FakeControlPlane();
    controlPlane.holdWaitUntilLogsDrained = true;
    controlPlane.logPages = [{ events: [] }];
    controlPlane.getLogEvents = async (query) => {
      controlPlane.getLogEventsCalls.push(query);
      controlPlane.logPages.shift();
      throw new Error("ResourceNotFoundException");
    };
    const context = buildTestRunContext({ controlPlane });

    await observeTask(context, handle, selectWatchContainer(td), STARTED_AT, "running");

    expect(controlPlane.getLogEventsCalls).toHaveLength(1);
    expect(context.logger.messages("debug")).toEqual([
      "failed to fetch log events from batch/app/0123abcd: ResourceNotFoundException",
    ]);
  });

  it("stops before waiting when the run is cancelled during the grace period", async () => {
    const controller = new AbortController();
    controller.abort(new Error("interrupted"));
    const context = buildTestRunContext({ signal: controller.signal });

    await expect(
      observeTask(context, handle, selectWatchContainer(td), STARTED_AT, "running"),
    ).rejects.toThrow("interrupted");
    expect(context.controlPlane.waitCallCount).toBe(0);
  });

  it("stops the wait and the log loop when the run is cancelled mid-wait", async () => {
    const controller = new AbortController();
    const controlPlane = new FakeControlPlane();
    controlPlane.waitUntilStopped = (target, policy) => {
      controlPlane.waitStoppedCalls.push({ target, policy });
      return new Promise<void>((_resolve, reject) => {
        policy.signal?.addEventListener("abort", () => reject(policy.signal?.reason), {
          once: true,
        });
      });
    };
    const context = buildTestRunContext({ controlPlane, signal: controller.signal });

    const result = observeTask(context, handle, selectWatchContainer(td), STARTED_AT, "stopped");
    await turnUntil(() => controlPlane.getLogEventsCalls.length >= 2);
    controller.abort(new Error("interrupted"));

    await expect(result).rejects.toThrow("failed to wait for task ID 0123abcd: interrupted");
    const fetched = controlPlane.getLogEventsCalls.length;
    expect(fetched).toBeGreaterThanOrEqual(2);
    await turnUntil(() => false);
    expect(controlPlane.getLogEventsCalls).toHaveLength(fetched);
    expect(controlPlane.waitStoppedCalls).toHaveLength(1);
  });
});

describe("waitForTask", () => {
  it("keeps the timeout class when wrapping", async () => {
    const controlPlane = new FakeControlPlane();
    controlPlane.waitStoppedError = new WaitTimeoutError("attempts exhausted");
    const context = buildTestRunContext({ controlPlane, timeoutMs: 10_000 });

    await expect(waitForTask(context, handle, "stopped")).rejects.toBeInstanceOf(WaitTimeoutError);
    expect(controlPlane.waitStoppedCalls[0]?.policy.maxAttempts).toBe(3);
  });
});

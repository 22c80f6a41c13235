import { describe, expect, it } from "vitest";

import { ResolutionError } from "../../../core/errors.js";
import { TASK_ARN, buildAwslogsTaskDefinition } from "../__tests__/fakes.js";

import type { TaskHandle } from "./types.js";
import { resolveLogTarget, selectWatchContainer } from "./watch-target.js";

const handle: TaskHandle = {
  taskArn: TASK_ARN,
  taskId: "0123abcd",
  cluster: "default",
  task: { taskArn: TASK_ARN },
};

describe("selectWatchContainer", () => {
  const td = buildAwslogsTaskDefinition("app", 4);

  it("defaults to the first container", () => {
    expect(selectWatchContainer(td).name).toBe("app");
  });

  it("selects a container by name", () => {
    expect(selectWatchContainer(td, "sidecar").name).toBe("sidecar");
  });

  it("rejects an unknown container name", () => {
    expect(() => selectWatchContainer(td, "worker")).toThrow(
      new ResolutionError(
        "container worker is not defined in arn:aws:ecs:us-east-1:123456789012:task-definition/app:4",
      ),
    );
  });

  it("rejects a task definition without containers", () => {
    expect(() => selectWatchContainer({ family: "empty" })).toThrow(
      "empty has no container definitions",
    );
  });
});

describe("resolveLogTarget", () => {
  const td = buildAwslogsTaskDefinition("app", 4);

  it("builds the stream name from prefix, container and task ID", () => {
    expect(resolveLogTarget(handle, selectWatchContainer(td))).toEqual({
      logGroupName: "/ecs/app",
      logStreamName: "batch/app/0123abcd",
    });
  });

  it("returns null without the awslogs driver", () => {
    expect(resolveLogTarget(handle, selectWatchContainer(td, "sidecar"))).toBeNull();
  });

  it("returns null without a stream prefix", () => {
    const container = {
      name: "app",
      logConfiguration: { logDriver: "awslogs" as const, options: { "awslogs-group": "/ecs/app" } },
    };
    expect(resolveLogTarget(handle, container)).toBeNull();
  });
});

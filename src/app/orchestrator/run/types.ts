import type { ContainerDefinition, Task } from "@aws-sdk/client-ecs";

// =============================================================================
// RUN REQUEST
// =============================================================================

export type ReferenceMode =
  | { kind: "register"; taskDefinitionPath?: string }
  | { kind: "latest"; revision?: number }
  | { kind: "skip"; revision?: number };

export type OverrideSource =
  | { kind: "none" }
  | { kind: "inline"; json: string }
  | { kind: "file"; path: string };

export type TagPropagation =
  | { kind: "none" }
  | { kind: "from-service" }
  /** Raw mode string, sent to ECS unchanged. */
  | { kind: "native"; value: string };

export type WaitUntil = "running" | "stopped";

export type RunRequest = Readonly<{
  reference: ReferenceMode;
  overrides: OverrideSource;
  count: number;
  /** Raw `Key=Value,...` list; parsed at submission. */
  tags?: string;
  propagateTags: TagPropagation;
  dryRun: boolean;
  noWait: boolean;
  waitUntil: WaitUntil;
  watchContainer?: string;
}>;

// =============================================================================
// RESOLVED VALUES
// =============================================================================

export type TaskReference =
  | { kind: "live"; arn: string }
  | { kind: "pending-registration"; family: string };

export type TaskHandle = {
  taskArn: string;
  taskId: string;
  cluster: string;
  task: Task;
};

export type WatchTarget = ContainerDefinition & { name: string };

export type LogTarget = {
  logGroupName: string;
  logStreamName: string;
};

export type LogCursor = {
  startTime: number;
  nextToken?: string;
};

export function describeTaskReference(reference: TaskReference): string {
  switch (reference.kind) {
    case "live":
      return reference.arn;
    case "pending-registration":
      return `family ${reference.family} will be registered`;
  }
}

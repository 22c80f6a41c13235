import { CloudWatchLogsClient, GetLogEventsCommand } from "@aws-sdk/client-cloudwatch-logs";
import {
  DescribeServicesCommand,
  DescribeTaskDefinitionCommand,
  DescribeTasksCommand,
  ECSClient,
  ListTagsForResourceCommand,
  PropagateTags,
  RegisterTaskDefinitionCommand,
  RunTaskCommand,
  paginateListTaskDefinitions,
  waitUntilTasksRunning,
  waitUntilTasksStopped,
  type Service,
  type Tag,
  type Task,
  type TaskDefinition,
} from "@aws-sdk/client-ecs";
import { HttpRequest } from "@smithy/protocol-http";

import type {
  ControlPlane,
  LogEventsPage,
  LogEventsQuery,
  RunTaskInput,
  RunTaskResult,
  TaskTarget,
  WaitPolicy,
} from "../app/orchestrator/ports.js";
import type { TaskDefinitionInput } from "../core/definitions.js";
import {
  ResolutionError,
  TaskStoppedError,
  WaitError,
  WaitTimeoutError,
} from "../core/errors.js";
import { arnToName } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type AwsControlPlaneOptions = {
  region?: string;
  ecs?: ECSClient;
  logs?: CloudWatchLogsClient;
};

type TaskWaiter = typeof waitUntilTasksRunning;

type WaitTarget = "running" | "stopped";

export const RAW_PROPAGATE_TAGS_MIDDLEWARE = "rawPropagateTags";

// =============================================================================
// ADAPTER
// =============================================================================

export class AwsControlPlane implements ControlPlane {
  private readonly ecs: ECSClient;
  private readonly logs: CloudWatchLogsClient;

  constructor(opts: AwsControlPlaneOptions = {}) {
    this.ecs = opts.ecs ?? new ECSClient({ region: opts.region });
    this.logs = opts.logs ?? new CloudWatchLogsClient({ region: opts.region });
  }

  async describeService(cluster: string, service: string): Promise<Service> {
    const out = await this.ecs.send(new DescribeServicesCommand({ cluster, services: [service] }));
    const found = out.services?.[0];
    if (!found) {
      const reason = out.failures?.[0]?.reason;
      throw new ResolutionError(
        `service ${service} is not found in cluster ${cluster}${reason ? ` (${reason})` : ""}`,
      );
    }
    return found;
  }

  async describeTaskDefinition(taskDefinition: string): Promise<TaskDefinition> {
    const out = await this.ecs.send(new DescribeTaskDefinitionCommand({ taskDefinition }));
    if (!out.taskDefinition) {
      throw new ResolutionError(`task definition ${taskDefinition} is not found`);
    }
    return out.taskDefinition;
  }

  async listTaskDefinitionArns(familyPrefix: string): Promise<string[]> {
    const arns: string[] = [];
    const pages = paginateListTaskDefinitions(
      { client: this.ecs },
      { familyPrefix, status: "ACTIVE", sort: "DESC" },
    );
    for await (const page of pages) {
      arns.push(...(page.taskDefinitionArns ?? []));
    }
    return arns;
  }

  async registerTaskDefinition(input: TaskDefinitionInput): Promise<TaskDefinition> {
    const out = await this.ecs.send(new RegisterTaskDefinitionCommand(input));
    if (!out.taskDefinition) {
      throw new ResolutionError(`registering ${input.family} returned no task definition`);
    }
    return out.taskDefinition;
  }

  async listTagsForResource(resourceArn: string): Promise<Tag[]> {
    const out = await this.ecs.send(new ListTagsForResourceCommand({ resourceArn }));
    return out.tags ?? [];
  }

  async runTask(input: RunTaskInput, signal?: AbortSignal): Promise<RunTaskResult> {
    const { propagateTags, ...rest } = input;
    const command = new RunTaskCommand(
      isPropagateTags(propagateTags) ? { ...rest, propagateTags } : rest,
    );

    if (propagateTags !== undefined && !isPropagateTags(propagateTags)) {
      // The typed input only admits the SDK's enum; other modes go into the body as given.
      const raw = propagateTags;
      command.middlewareStack.add(
        (next) => async (args) => {
          if (HttpRequest.isInstance(args.request) && typeof args.request.body === "string") {
            args.request.body = setJsonBodyField(args.request.body, "propagateTags", raw);
          }
          return next(args);
        },
        { step: "build", name: RAW_PROPAGATE_TAGS_MIDDLEWARE, priority: "high" },
      );
    }

    const out = await this.ecs.send(command, { abortSignal: signal });
    return { tasks: out.tasks ?? [], failures: out.failures ?? [] };
  }

  async waitUntilRunning(target: TaskTarget, policy: WaitPolicy): Promise<void> {
    await this.waitForTask(waitUntilTasksRunning, target, policy, "running");
  }

  async waitUntilStopped(target: TaskTarget, policy: WaitPolicy): Promise<void> {
    await this.waitForTask(waitUntilTasksStopped, target, policy, "stopped");
  }

  async describeTask(target: TaskTarget): Promise<Task | undefined> {
    const out = await this.ecs.send(
      new DescribeTasksCommand({ cluster: target.cluster, tasks: [target.taskArn] }),
    );
    return out.tasks?.[0];
  }

  async getLogEvents(query: LogEventsQuery): Promise<LogEventsPage> {
    const out = await this.logs.send(
      new GetLogEventsCommand({
        logGroupName: query.logGroupName,
        logStreamName: query.logStreamName,
        startTime: query.startTime,
        nextToken: query.nextToken,
        startFromHead: true,
      }),
      { abortSignal: query.signal },
    );
    return { events: out.events ?? [], nextForwardToken: out.nextForwardToken };
  }

  private async waitForTask(
    waiter: TaskWaiter,
    target: TaskTarget,
    policy: WaitPolicy,
    until: WaitTarget,
  ): Promise<void> {
    // Equal min/max delay keeps the SDK's backoff constant.
    const delaySeconds = Math.max(1, Math.ceil(policy.delayMs / 1000));
    try {
      await waiter(
        {
          client: this.ecs,
          minDelay: delaySeconds,
          maxDelay: delaySeconds,
          maxWaitTime: delaySeconds * policy.maxAttempts,
          abortSignal: policy.signal,
        },
        { cluster: target.cluster, tasks: [target.taskArn] },
      );
    } catch (err) {
      throw classifyWaiterError(err, target, until, policy);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function isPropagateTags(value: string | undefined): value is PropagateTags {
  return Object.values<string | undefined>(PropagateTags).includes(value);
}

/** Sets one top-level field of a JSON object body; other bodies come back unchanged. */
export function setJsonBodyField(body: string, field: string, value: string): string {
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return body;
  }
  return JSON.stringify({ ...parsed, [field]: value });
}

function classifyWaiterError(
  err: unknown,
  target: TaskTarget,
  until: WaitTarget,
  policy: WaitPolicy,
): unknown {
  const id = arnToName(target.taskArn);
  const name = err instanceof Error ? err.name : undefined;

  if (name === "AbortError") {
    return err;
  }
  if (name === "TimeoutError") {
    return new WaitTimeoutError(
      `task ID ${id} did not become ${until} within ${policy.maxAttempts} attempts`,
      err,
    );
  }
  if (until === "running") {
    // The running waiter only fails outright when the task is STOPPED or MISSING.
    return new TaskStoppedError(`task ID ${id} stopped before it was running`, err);
  }
  return new WaitError(`waiting for task ID ${id} to stop failed`, err);
}

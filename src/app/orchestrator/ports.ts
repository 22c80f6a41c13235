/**
 * Orchestrator ports define the boundary between the run engine and adapters.
 * Purpose: make remote and timing dependencies explicit and replaceable for testing.
 * Assumptions: ports map one-to-one onto ECS / CloudWatch Logs operations.
 * Usage: provide implementations in `run-context.ts` and inject into RunContext.
 */

import type { OutputLogEvent } from "@aws-sdk/client-cloudwatch-logs";
import type {
  Failure,
  RunTaskCommandInput,
  Service,
  Tag,
  Task,
  TaskDefinition,
} from "@aws-sdk/client-ecs";

import type { TaskDefinitionInput } from "../../core/definitions.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskTarget = {
  cluster: string;
  taskArn: string;
};

export type WaitPolicy = {
  delayMs: number;
  maxAttempts: number;
  signal?: AbortSignal;
};

/** RunTask input whose propagation mode is sent to ECS as given. */
export type RunTaskInput = Omit<RunTaskCommandInput, "propagateTags"> & {
  propagateTags?: string;
};

export type RunTaskResult = {
  tasks: Task[];
  failures: Failure[];
};

export type LogEventsQuery = {
  logGroupName: string;
  logStreamName: string;
  startTime: number;
  nextToken?: string;
  signal?: AbortSignal;
};

export type LogEventsPage = {
  events: OutputLogEvent[];
  nextForwardToken?: string;
};

// =============================================================================
// PORTS
// =============================================================================

export interface ControlPlane {
  describeService(cluster: string, service: string): Promise<Service>;
  describeTaskDefinition(taskDefinition: string): Promise<TaskDefinition>;
  /** ARNs of every ACTIVE revision whose family starts with `familyPrefix`. */
  listTaskDefinitionArns(familyPrefix: string): Promise<string[]>;
  registerTaskDefinition(input: TaskDefinitionInput): Promise<TaskDefinition>;
  listTagsForResource(resourceArn: string): Promise<Tag[]>;
  runTask(input: RunTaskInput, signal?: AbortSignal): Promise<RunTaskResult>;
  /** Rejects with TaskStoppedError if the task stops first, WaitTimeoutError when attempts run out. */
  waitUntilRunning(target: TaskTarget, policy: WaitPolicy): Promise<void>;
  /** Rejects with WaitTimeoutError when attempts run out. */
  waitUntilStopped(target: TaskTarget, policy: WaitPolicy): Promise<void>;
  describeTask(target: TaskTarget): Promise<Task | undefined>;
  getLogEvents(query: LogEventsQuery): Promise<LogEventsPage>;
}

export interface Clock {
  now(): Date;
  /** Rejects with the signal's reason when aborted. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

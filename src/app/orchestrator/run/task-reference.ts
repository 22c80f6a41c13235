import type { TaskDefinitionInput } from "../../../core/definitions.js";
import { ResolutionError, wrapError } from "../../../core/errors.js";
import { arnToName, parseTaskDefinitionName } from "../../../core/utils.js";
import type { RunContext } from "../run-context.js";

import type { ReferenceMode, RunRequest, TaskReference } from "./types.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveTaskReference(
  context: RunContext,
  request: Pick<RunRequest, "reference" | "dryRun">,
): Promise<TaskReference> {
  const mode: ReferenceMode = request.reference;

  switch (mode.kind) {
    case "skip":
    case "latest": {
      const family = await resolveFamily(context);
      if (mode.revision !== undefined && mode.revision > 0) {
        return { kind: "live", arn: `${family}:${mode.revision}` };
      }

      context.logger.log(`Revision is not specified. Use latest task definition family ${family}`);
      return { kind: "live", arn: await findLatestTaskDefinitionArn(context, family) };
    }

    case "register": {
      const td = await context.definitions.loadTaskDefinition(
        mode.taskDefinitionPath ?? context.taskDefinitionPath,
      );
      if (request.dryRun) {
        return { kind: "pending-registration", family: td.family };
      }
      return { kind: "live", arn: await registerTaskDefinition(context, td) };
    }
  }
}

export async function findLatestTaskDefinitionArn(
  context: RunContext,
  family: string,
): Promise<string> {
  let arns: string[];
  try {
    arns = await context.controlPlane.listTaskDefinitionArns(family);
  } catch (err) {
    throw wrapError(err, `failed to list task definitions of family ${family}`, ResolutionError);
  }

  let latest: { arn: string; revision: number } | null = null;
  for (const arn of arns) {
    const name = parseTaskDefinitionName(arn);
    // The listing matches by prefix, so `app` also returns `app-worker`.
    if (name.family !== family || name.revision === undefined) continue;
    if (!latest || name.revision > latest.revision) {
      latest = { arn, revision: name.revision };
    }
  }

  if (!latest) {
    throw new ResolutionError(`no task definition revisions registered for family ${family}`);
  }
  return latest.arn;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveFamily(context: RunContext): Promise<string> {
  if (!context.service) {
    const td = await context.definitions.loadTaskDefinition(context.taskDefinitionPath);
    return td.family;
  }

  let taskDefinitionArn: string | undefined;
  try {
    const service = await context.controlPlane.describeService(context.cluster, context.service);
    taskDefinitionArn = service.taskDefinition;
  } catch (err) {
    throw wrapError(err, `failed to describe service ${context.service}`, ResolutionError);
  }

  if (!taskDefinitionArn) {
    throw new ResolutionError(`service ${context.service} has no task definition`);
  }
  return parseTaskDefinitionName(taskDefinitionArn).family;
}

async function registerTaskDefinition(
  context: RunContext,
  td: TaskDefinitionInput,
): Promise<string> {
  context.logger.log(`Registering a new task definition of family ${td.family}...`);

  let arn: string | undefined;
  try {
    const registered = await context.controlPlane.registerTaskDefinition(td);
    arn = registered.taskDefinitionArn;
  } catch (err) {
    throw wrapError(err, `failed to register task definition ${td.family}`, ResolutionError);
  }

  if (!arn) {
    throw new ResolutionError(`registration of ${td.family} returned no task definition ARN`);
  }
  context.logger.log(`Task definition is registered ${arnToName(arn)}`);
  return arn;
}

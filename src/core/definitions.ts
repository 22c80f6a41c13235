/*
Purpose: load task definitions, service definitions and task overrides from local files.
Assumptions: documents use the ECS API's JSON field names; `.yaml`/`.yml` files are YAML,
anything else JSON. `${VAR}` references are expanded from the environment.
Usage: const td = await loadTaskDefinition("ecs-task-def.json").
*/

import path from "node:path";

import type {
  CreateServiceCommandInput,
  RegisterTaskDefinitionCommandInput,
  TaskOverride,
} from "@aws-sdk/client-ecs";
import fse from "fs-extra";
import yaml from "js-yaml";
import type { z } from "zod";

import { expandEnv, formatIssues } from "./config-loader.js";
import {
  ServiceDefinitionSchema,
  TaskDefinitionSchema,
  TaskOverrideSchema,
} from "./definition-schemas.js";
import { ConfigError, DefinitionError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskDefinitionInput = RegisterTaskDefinitionCommandInput & { family: string };

/** Placement and networking fields a service shares with RunTask. */
export type ServiceDefinition = Pick<
  CreateServiceCommandInput,
  | "launchType"
  | "networkConfiguration"
  | "capacityProviderStrategy"
  | "placementConstraints"
  | "placementStrategy"
  | "platformVersion"
  | "enableECSManagedTags"
  | "enableExecuteCommand"
>;

export interface DefinitionSource {
  loadTaskDefinition(filePath: string): Promise<TaskDefinitionInput>;
  loadServiceDefinition(filePath: string): Promise<ServiceDefinition>;
  loadOverrides(filePath: string): Promise<TaskOverride>;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadTaskDefinition(filePath: string): Promise<TaskDefinitionInput> {
  const doc = await readDefinitionFile(filePath);
  return validateDocument(doc, TaskDefinitionSchema, filePath);
}

export async function loadServiceDefinition(filePath: string): Promise<ServiceDefinition> {
  const doc = await readDefinitionFile(filePath);
  return validateDocument(doc, ServiceDefinitionSchema, filePath);
}

export async function loadOverrides(filePath: string): Promise<TaskOverride> {
  const doc = await readDefinitionFile(filePath);
  return validateDocument(doc, TaskOverrideSchema, filePath);
}

export function parseOverrides(json: string): TaskOverride {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (err) {
    throw new DefinitionError(`malformed JSON: ${formatCause(err)}`, err);
  }
  return validateDocument(doc, TaskOverrideSchema, "overrides");
}

export function createFileDefinitionSource(): DefinitionSource {
  return { loadTaskDefinition, loadServiceDefinition, loadOverrides };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readDefinitionFile(filePath: string): Promise<unknown> {
  const absolutePath = path.resolve(filePath);

  let raw: string;
  try {
    raw = await fse.readFile(absolutePath, "utf8");
  } catch (err) {
    throw new DefinitionError(`failed to read ${absolutePath}: ${formatCause(err)}`, err);
  }

  let doc: unknown;
  try {
    doc = isYamlPath(absolutePath) ? yaml.load(raw) : JSON.parse(raw);
  } catch (err) {
    throw new DefinitionError(`failed to parse ${absolutePath}: ${formatCause(err)}`, err);
  }

  try {
    return expandEnv(doc, { file: absolutePath, trail: [] });
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new DefinitionError(err.message, err);
    }
    throw err;
  }
}

function validateDocument<T>(
  doc: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string,
): T {
  const checked = schema.safeParse(doc);
  if (!checked.success) {
    throw new DefinitionError(
      `invalid definition in ${source}:\n${formatIssues(checked.error.issues)}`,
      checked.error,
    );
  }

  return checked.data;
}

function isYamlPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
}

function formatCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

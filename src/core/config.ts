import { z } from "zod";

export const DEFAULT_CONFIG_FILENAME = "deckhand.yaml";
export const DEFAULT_TIMEOUT_SECONDS = 600;

export const DeployConfigSchema = z
  .object({
    // Falls back to the SDK's default region chain when unset.
    region: z.string().min(1).optional(),
    cluster: z.string().min(1).default("default"),
    service: z.string().min(1).optional(),

    service_definition: z.string().min(1).optional(),
    task_definition: z.string().min(1),

    timeout_seconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
  })
  .strict();

export type DeployConfig = z.infer<typeof DeployConfigSchema>;

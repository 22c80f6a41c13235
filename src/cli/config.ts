import path from "node:path";

import { DEFAULT_CONFIG_FILENAME, type DeployConfig } from "../core/config.js";
import { loadDeployConfig } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export function resolveConfigPath(args: LoadConfigForCliArgs): string {
  const cwd = args.cwd ?? process.cwd();
  return path.resolve(cwd, args.explicitConfigPath ?? DEFAULT_CONFIG_FILENAME);
}

export function loadConfigForCli(args: LoadConfigForCliArgs): {
  config: DeployConfig;
  configPath: string;
} {
  const configPath = resolveConfigPath(args);
  return { config: loadDeployConfig(configPath), configPath };
}

import { Command } from "commander";

import { loadConfigForCli } from "./config.js";
import { runCommand } from "./run.js";
import {
  parseCount,
  parsePropagateTags,
  parseRevision,
  parseWaitUntil,
  type RunCliOptions,
} from "./run-options.js";

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("deckhand")
    .description("Run ad-hoc ECS tasks and follow them to completion")
    .version("0.1.0")
    .option("--config <path>", "Deploy config path (default: ./deckhand.yaml)")
    .option("--debug", "Print request details and full error output", false);

  program
    .command("run")
    .description("Run a one-off task and wait for it")
    .option("--task-def <path>", "Task definition file to register (default: from config)")
    .option("--revision <n>", "Task definition revision to run", parseRevision)
    .option(
      "--skip-task-definition",
      "Do not register; run --revision or the family's latest revision",
      false,
    )
    .option("--latest-task-definition", "Run the family's latest registered revision", false)
    .option("--dry-run", "Resolve the task definition without running anything", false)
    .option("--no-wait", "Return as soon as the task is submitted")
    .option("--wait-until <state>", "Wait until running or stopped", parseWaitUntil, "stopped")
    .option("--overrides <json>", "Task overrides as JSON (wins over --overrides-file)")
    .option("--overrides-file <path>", "Task overrides file (JSON or YAML)")
    .option("--count <n>", "Number of tasks to run", parseCount, 1)
    .option("--tags <list>", "Task tags as Key=Value,Key2=Value2")
    .option(
      "--propagate-tags <mode>",
      "SERVICE copies the service's tags; other modes are sent to ECS as given",
      parsePropagateTags,
    )
    .option("--watch-container <name>", "Container whose logs are streamed (default: first)")
    .action(async (opts: RunCliOptions) => {
      const globals = program.opts<GlobalCliOptions>();
      const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
      await runCommand(config, opts, { debug: globals.debug });
    });

  return program;
}

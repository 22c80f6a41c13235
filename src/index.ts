#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli, type GlobalCliOptions } from "./cli/index.js";

/** Commander exits that carry no error for the user. */
const INFORMATIONAL_EXIT_CODES = new Set([
  "commander.help",
  "commander.helpDisplayed",
  "commander.version",
]);

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  silenceCommanderExits(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    process.exitCode = reportFailure(error, argv, program);
  }
}

// Subcommands copy output and exit settings only when created, so each gets them here.
function silenceCommanderExits(program: Command): void {
  for (const command of [program, ...program.commands]) {
    command.configureOutput({ outputError: () => undefined }).exitOverride();
  }
}

function reportFailure(error: unknown, argv: string[], program: Command): number {
  const commanderExit = error instanceof CommanderError ? error : undefined;
  if (commanderExit && INFORMATIONAL_EXIT_CODES.has(commanderExit.code)) {
    return commanderExit.exitCode;
  }

  // Parsing may stop before commander records --debug, so argv is checked first.
  const debug = debugRequested(argv) || program.opts<GlobalCliOptions>().debug === true;
  console.error(renderCliError(error, { debug }));

  const exitCode = commanderExit?.exitCode ?? 1;
  return exitCode === 0 ? 1 : exitCode;
}

function debugRequested(argv: string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--debug");
}

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm installs the bin as a symlink.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}

#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  createPollCommand,
  createStatusCommand,
  createCleanCommand,
  createErrorsCommand,
  createReposCommand,
} from "./commands/index.js";
import { logger } from "../infra/logger.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("sessiongate")
  .description(pc.cyan("Admission control and retry policy for poll-driven development sessions"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean }>();
    if (opts.verbose) {
      // Picked up by loadConfig, which every command runs
      process.env["SESSIONGATE_VERBOSE"] = "true";
      logger.configure({ level: "debug", verbose: true });
    }
  });

// Register commands
program.addCommand(createPollCommand());
program.addCommand(createStatusCommand());
program.addCommand(createCleanCommand());
program.addCommand(createErrorsCommand());
program.addCommand(createReposCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.help" || err.code === "commander.helpDisplayed") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  logger.error(`Command failed: ${err.message}`);
  process.exit(1);
});

// Parse and execute
async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error instanceof Error ? error : undefined);
  process.exit(1);
});

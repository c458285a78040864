import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { bootstrap, fail } from "../bootstrap.js";

export function createErrorsCommand(): Command {
  const command = new Command("errors").description("Inspect and clear item error states");

  command
    .command("list")
    .description("List items in error state")
    .option("--json", "Output as JSON", false)
    .action(async (options: { json: boolean }) => {
      try {
        const { errors } = bootstrap();
        const states = await errors.list();

        if (options.json) {
          console.log(JSON.stringify(states, null, 2));
          return;
        }

        if (states.length === 0) {
          console.error(pc.dim("No items in error state"));
          return;
        }
        for (const state of states) {
          const skip = await errors.shouldSkip(state.key);
          console.error(
            `${pc.cyan(state.key)} ${pc.yellow(state.kind)} ${pc.dim(`attempts: ${state.attempts}`)}${skip ? ` ${pc.red("skipped")}` : ""}`
          );
          console.error(`  ${state.message}`);
          console.error(pc.dim(`  next retry: ${state.nextRetry.toISOString()}`));
        }
      } catch (error) {
        fail(error);
      }
    });

  command
    .command("clear")
    .description("Clear the error state of an item so it is considered again")
    .argument("<key>", "Item key, e.g. acme/api-issue-42 or source:acme/api")
    .action(async (key: string) => {
      try {
        const { errors } = bootstrap();
        if (await errors.clear(key)) {
          logger.success(`Cleared ${pc.cyan(key)}`);
        } else {
          logger.info(`No record for ${key}`);
        }
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

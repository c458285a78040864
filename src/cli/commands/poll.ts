import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import type { ProjectCycleResult } from "../../core/engine/coordinator.js";
import { bootstrap, fail } from "../bootstrap.js";

function printResult(result: ProjectCycleResult): void {
  const header = `${pc.cyan(result.projectId)} ${pc.dim(`slots: ${result.slots}, fetched: ${result.fetched}`)}`;
  console.error(header);

  if (result.skipped) {
    const detail = result.error ? `: ${result.error}` : "";
    console.error(`  ${pc.yellow("skipped")} ${result.skipped}${pc.dim(detail)}`);
    return;
  }
  if (result.items.length === 0) {
    console.error(pc.dim("  No eligible candidates"));
    return;
  }
  for (const item of result.items) {
    const status =
      item.status === "marked"
        ? pc.green("ready")
        : item.status === "dry_run"
          ? pc.blue("would mark")
          : pc.red("failed");
    console.error(`  ${status} #${item.id} ${item.title}${item.error ? pc.dim(` (${item.error})`) : ""}`);
  }
}

export function createPollCommand(): Command {
  const command = new Command("poll")
    .description("Run one self-iteration cycle: select ready items within free WIP slots")
    .option("-p, --project <id>", "Only poll this project")
    .option("--dry-run", "Log ready actions instead of performing them", false)
    .action(async (options: { project?: string; dryRun: boolean }) => {
      try {
        const runtime = bootstrap();
        logger.header("sessiongate - Poll");

        if (!runtime.config.selfIteration.enabled) {
          logger.warn("Self-iteration is disabled; set selfIteration.enabled in config.json");
          return;
        }

        const cycle = options.dryRun ? { dryRun: true } : {};
        const results = options.project
          ? [await runtime.coordinator.runProject(options.project, cycle)]
          : await runtime.coordinator.runAll(cycle);

        for (const result of results) {
          printResult(result);
        }

        const failed = results.some(
          (r) => r.skipped === "failed" || r.items.some((item) => item.status === "failed")
        );
        if (failed) {
          process.exitCode = 1;
        }
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { bootstrap, fail } from "../bootstrap.js";

interface CleanOptions {
  sessions: boolean;
  clones: boolean;
  force: boolean;
  dryRun: boolean;
}

export function createCleanCommand(): Command {
  const command = new Command("clean")
    .description("Kill orphaned sessions, resync WIP, and remove orphaned clones")
    .option("--sessions", "Only clean sessions", false)
    .option("--clones", "Only clean clones", false)
    .option("-f, --force", "Remove clones even with uncommitted or unpushed work", false)
    .option("--dry-run", "Show what would be cleaned without doing it", false)
    .action(async (options: CleanOptions) => {
      try {
        const { coordinator, sessions, janitor } = bootstrap();
        logger.header("sessiongate - Clean");

        // Neither flag means both
        const doSessions = options.sessions || !options.clones;
        const doClones = options.clones || !options.sessions;
        const total = Number(doSessions) + Number(doClones);
        let step = 0;

        if (doSessions) {
          logger.step(++step, total, "Sessions");
          const report = await coordinator.reconcile({ dryRun: options.dryRun });
          if (report.orphans.length === 0) {
            console.error(pc.dim("No orphaned sessions"));
          }
          for (const name of report.orphans) {
            const verb = options.dryRun ? "Would kill" : report.killed.includes(name) ? "Killed" : "Failed to kill";
            console.error(`  ${verb} ${pc.cyan(name)}`);
          }
          for (const key of report.staleWipKeys) {
            console.error(`  ${options.dryRun ? "Would drop" : "Dropped"} WIP entry ${pc.dim(key)}`);
          }
          if (report.failed.length > 0) {
            process.exitCode = 1;
          }
        }

        if (doClones) {
          logger.step(++step, total, "Clones");
          const live = await sessions.listManagedSessions();
          const results = await janitor.clean(
            live.map((record) => record.workspace),
            { force: options.force, dryRun: options.dryRun }
          );
          if (results.length === 0) {
            console.error(pc.dim("No orphaned clones"));
          }
          for (const result of results) {
            switch (result.status) {
              case "removed":
                console.error(`  ${pc.green("Removed")} ${result.clone.path}`);
                break;
              case "would_remove":
                console.error(`  ${pc.blue("Would remove")} ${result.clone.path}`);
                break;
              case "skipped":
                console.error(`  ${pc.yellow("Skipped")} ${result.clone.path} ${pc.dim(`(${result.reason ?? ""})`)}`);
                break;
            }
          }
        }
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

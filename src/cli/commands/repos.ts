import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { bootstrap, fail } from "../bootstrap.js";

export function createReposCommand(): Command {
  const command = new Command("repos").description("Inspect per-project configuration (repos.yaml)");

  command
    .command("list")
    .description("List configured projects with their resolved limits")
    .action(() => {
      try {
        const { repoConfig, paths } = bootstrap();
        console.error(pc.dim(`Repos file: ${paths.reposFile}`));

        const ids = repoConfig.list();
        if (ids.length === 0) {
          console.error(pc.dim("No projects configured"));
          return;
        }
        for (const id of ids) {
          const resolved = repoConfig.getWithDefaults(id);
          console.error(
            `${pc.cyan(id)} ${pc.dim(resolved.repo_path ?? "(no repo_path)")} max ${resolved.wip_limits.max_concurrent} ${pc.dim(resolved.issue_tracker.type)}`
          );
        }
      } catch (error) {
        fail(error);
      }
    });

  command
    .command("validate")
    .description("Check every project for configuration problems")
    .action(() => {
      try {
        const { repoConfig } = bootstrap();
        const problems = repoConfig.validate();
        if (problems.length === 0) {
          logger.success(`${repoConfig.list().length} project(s) valid`);
          return;
        }
        for (const problem of problems) {
          logger.error(problem);
        }
        process.exitCode = 1;
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

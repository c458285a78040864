import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import type { ErrorState } from "../../core/errors/error-policy.js";
import { ERROR_KIND_POLICIES } from "../../core/errors/error-kinds.js";
import type { WipSession } from "../../types/session.js";
import { bootstrap, fail } from "../bootstrap.js";

interface ProjectStatus {
  projectId: string;
  limit: number;
  active: number;
  availableSlots: number;
  sessions: WipSession[];
}

function formatAge(since: Date, now: Date): string {
  const minutes = Math.max(0, Math.round((now.getTime() - since.getTime()) / 60_000));
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  return hours < 48 ? `${hours}h` : `${Math.floor(hours / 24)}d`;
}

function describeError(state: ErrorState, now: Date): string {
  const policy = ERROR_KIND_POLICIES[state.kind];
  if (!policy.retryable) return pc.red("permanent");
  if (state.maxAttempts > 0 && state.attempts >= state.maxAttempts) return pc.red("exhausted");
  if (now < state.nextRetry) return pc.yellow(`retry in ${formatAge(now, state.nextRetry)}`);
  return pc.green("retry due");
}

export function createStatusCommand(): Command {
  const command = new Command("status")
    .description("Show WIP sessions, free slots per project, and error states")
    .option("--json", "Print machine-readable JSON to stdout", false)
    .action(async (options: { json: boolean }) => {
      try {
        const { repoConfig, wip, errors, config } = bootstrap();
        const now = new Date();

        const sessions = await wip.listSessions();
        const projectIds = new Set([...repoConfig.list(), ...sessions.map((s) => s.projectId)]);
        const projects: ProjectStatus[] = [];
        for (const projectId of projectIds) {
          const projectSessions = sessions.filter((s) => s.projectId === projectId);
          projects.push({
            projectId,
            limit: wip.projectLimit(projectId),
            active: projectSessions.length,
            availableSlots: await wip.availableSlots(projectId),
            sessions: projectSessions,
          });
        }
        const errorStates = await errors.list();

        if (options.json) {
          const payload = {
            global: { limit: config.wipLimits.globalMax, active: sessions.length },
            projects,
            errors: errorStates,
          };
          console.log(JSON.stringify(payload, null, 2));
          return;
        }

        logger.header("sessiongate - Status");

        console.error(pc.bold("WIP"));
        console.error(pc.dim("─".repeat(40)));
        console.error(`  Global: ${pc.cyan(String(sessions.length))} / ${pc.dim(String(config.wipLimits.globalMax))}`);
        console.error("");

        for (const project of projects) {
          console.error(
            `  ${pc.cyan(project.projectId)} ${project.active}/${project.limit} ${pc.dim(`(${project.availableSlots} free)`)}`
          );
          for (const session of project.sessions) {
            console.error(
              `    ${session.key} ${pc.dim(`[${session.priority}] ${formatAge(session.startedAt, now)}`)}`
            );
          }
        }
        console.error("");

        console.error(pc.bold("Errors"));
        console.error(pc.dim("─".repeat(40)));
        if (errorStates.length === 0) {
          console.error(pc.dim("  No items in error state"));
        }
        for (const state of errorStates) {
          const cap = state.maxAttempts > 0 ? `/${state.maxAttempts}` : "";
          console.error(
            `  ${state.key} ${pc.yellow(state.kind)} attempts ${state.attempts}${cap} ${describeError(state, now)}`
          );
          console.error(`    ${pc.dim(state.message)}`);
        }
        console.error("");
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

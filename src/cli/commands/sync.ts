import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { toSyncStatus } from "../../services/sync/runs.js";
import { withCliContext } from "../context.js";
import { displayRunStatus, displayRunsTable, formatState } from "../utils/display.js";

import { parseMode, parsePositiveInt } from "./sources.js";

import type { SyncProgress } from "../../services/sync/orchestrator.js";
import type { SyncMode } from "../../types/index.js";
import type { Command } from "commander";

function describeProgress(progress: SyncProgress): string {
  const where = progress.bodyExternalId !== null ? ` (${progress.bodyExternalId})` : "";
  return `Run ${String(progress.runId)}: ${progress.phase}${where}, ${String(progress.pages)} pages`;
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Run and inspect sync runs");

  // sync run <sourceId>
  sync
    .command("run <sourceId>")
    .description("Sync one source and wait for the run to finish")
    .option("--mode <mode>", "FULL or INCREMENTAL (defaults to the source setting)", parseMode)
    .action(async (sourceId: string, options: { mode?: SyncMode }) => {
      const spinner = ora("Starting sync...").start();

      try {
        await withCliContext(async ({ service }) => {
          await service.runs.recoverStaleRuns();

          // Ctrl+C cancels the run at its next page boundary
          const onInterrupt = (): void => {
            spinner.text = "Cancelling...";
            void service.shutdown();
          };
          process.once("SIGINT", onInterrupt);

          try {
            const status = await service.runToCompletion(parsePositiveInt(sourceId), {
              mode: options.mode,
              requestedBy: "cli",
              onProgress: (progress) => {
                spinner.text = describeProgress(progress);
              },
            });

            if (status.state === "SUCCESS") {
              spinner.succeed(`Run ${String(status.runId)} finished`);
            } else if (status.state === "PARTIAL") {
              spinner.warn(`Run ${String(status.runId)} finished with failed entity types`);
            } else {
              spinner.fail(`Run ${String(status.runId)} ${status.state.toLowerCase()}`);
              process.exitCode = 1;
            }
            displayRunStatus(status);
          } finally {
            process.off("SIGINT", onInterrupt);
          }
        });
      } catch (error) {
        spinner.fail(`Sync failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // sync all
  sync
    .command("all")
    .description("Sync every enabled source through the worker pool")
    .option("--mode <mode>", "FULL or INCREMENTAL (defaults to each source setting)", parseMode)
    .action(async (options: { mode?: SyncMode }) => {
      const spinner = ora("Queueing runs...").start();

      try {
        await withCliContext(async ({ service, config }) => {
          await service.runs.recoverStaleRuns();
          const started = await service.syncAllEnabled(options.mode, "cli");
          if (started.length === 0) {
            spinner.info("No enabled sources");
            return;
          }

          service.events.on("run:finished", (event) => {
            spinner.text = `Run ${String(event.runId)} (source ${String(event.sourceId)}) ${event.state}`;
          });
          spinner.text = `${String(started.length)} runs queued, ${String(config.sync.concurrency)} at a time`;
          await service.onIdle();
          spinner.succeed("All runs finished");

          const statuses = await Promise.all(
            started.map((run) => service.getSyncStatus(run.runId))
          );
          displayRunsTable(statuses);
          if (statuses.some((status) => status.state === "FAILED")) {
            process.exitCode = 1;
          }
        });
      } catch (error) {
        spinner.fail(`Sync failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // sync status <runId>
  sync
    .command("status <runId>")
    .description("Show the status of a run")
    .option("--errors <count>", "Error samples to show", parsePositiveInt, 10)
    .action(async (runId: string, options: { errors: number }) => {
      try {
        await withCliContext(async ({ service }) => {
          displayRunStatus(
            await service.getSyncStatus(parsePositiveInt(runId)),
            options.errors
          );
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // sync runs <sourceId>
  sync
    .command("runs <sourceId>")
    .description("Show the run history of a source")
    .option("--limit <count>", "Number of runs", parsePositiveInt, 20)
    .action(async (sourceId: string, options: { limit: number }) => {
      try {
        await withCliContext(async ({ service }) => {
          const source = await service.sources.requireSource(parsePositiveInt(sourceId));
          const runs = await service.runs.listRuns(source.id, { limit: options.limit });
          if (runs.length === 0) {
            console.log(`No runs for source ${String(source.id)}`);
            return;
          }
          const latest = runs[0];
          if (latest !== undefined) {
            console.log(`${source.name}: last run ${formatState(latest.state)}`);
          }
          displayRunsTable(runs.map(toSyncStatus));
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}

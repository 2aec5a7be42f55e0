import { closeConnection } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { SyncScheduler } from "../../services/sync/scheduler.js";
import { createCliContext } from "../context.js";

import { parsePositiveInt } from "./sources.js";

import type { Command } from "commander";

interface WorkerOptions {
  interval?: number;
  fullInterval?: number;
  fullOnStart?: boolean;
}

// ============================================================================
// Worker Command
// ============================================================================

export function registerWorkerCommand(program: Command): void {
  program
    .command("worker")
    .description("Run the worker pool with the periodic scheduler until interrupted")
    .option("--interval <minutes>", "Incremental sync interval", parsePositiveInt)
    .option("--full-interval <hours>", "Full sync interval", parsePositiveInt)
    .option("--full-on-start", "Queue a full sync of every enabled source on start")
    .action(async (options: WorkerOptions) => {
      const { config, handle, service } = createCliContext();
      const scheduler = new SyncScheduler(service, {
        intervalMinutes: options.interval ?? config.sync.intervalMinutes,
        fullIntervalHours: options.fullInterval ?? config.sync.fullIntervalHours,
        fullOnStart: options.fullOnStart === true,
      });

      service.events.on("run:finished", (event) => {
        syncLogger.info({ ...event, pool: service.poolStats() }, "Run finished");
      });

      const shutdown = async (signal: string): Promise<void> => {
        syncLogger.info({ signal }, "Worker shutting down");
        scheduler.stop();
        await service.shutdown();
        await closeConnection(handle);
      };

      for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
          shutdown(signal).then(
            () => process.exit(0),
            (error: unknown) => {
              syncLogger.error({ error: errorMessage(error) }, "Worker shutdown failed");
              process.exit(1);
            }
          );
        });
      }

      try {
        const { recovered, resumed } = await service.start();
        console.log(
          `Worker ${service.workerId}: ${String(config.sync.concurrency)} slots, ${String(recovered.length)} stale runs failed, ${String(resumed.length)} pending runs resumed`
        );
        scheduler.start();
        if (options.fullOnStart !== true) {
          await scheduler.tickIncremental();
        }
      } catch (error) {
        console.error(`Worker failed to start: ${errorMessage(error)}`);
        await shutdown("startup-error");
        process.exitCode = 1;
      }
    });
}

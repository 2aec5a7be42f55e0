import chalk from "chalk";

import { errorMessage } from "../../errors.js";
import {
  countRelationsByStatus,
  listOrphans,
  requeueOrphans,
} from "../../services/sync/relations.js";
import { withCliContext } from "../context.js";
import { displayOrphansTable } from "../utils/display.js";

import { parsePositiveInt } from "./sources.js";

import type { Command } from "commander";

export function registerRelationsCommand(program: Command): void {
  const relations = program
    .command("relations")
    .description("Inspect unresolved relations");

  // relations orphans <sourceId>
  relations
    .command("orphans <sourceId>")
    .description("List relations whose target was never found")
    .option("--limit <count>", "Number of edges", parsePositiveInt, 50)
    .action(async (sourceId: string, options: { limit: number }) => {
      try {
        await withCliContext(async ({ service, handle }) => {
          const source = await service.sources.requireSource(parsePositiveInt(sourceId));
          const summary = await countRelationsByStatus(handle.db, source.id);
          console.log(
            `${source.name}: ${String(summary.resolved)} resolved, ${String(summary.stillPending)} pending, ${chalk.red(String(summary.orphaned))} orphaned`
          );

          const edges = await listOrphans(handle.db, source.id, { limit: options.limit });
          if (edges.length > 0) {
            displayOrphansTable(edges);
          }
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // relations requeue <sourceId>
  relations
    .command("requeue <sourceId>")
    .description("Retry orphaned relations during the next runs")
    .action(async (sourceId: string) => {
      try {
        await withCliContext(async ({ service, handle }) => {
          const source = await service.sources.requireSource(parsePositiveInt(sourceId));
          const count = await requeueOrphans(handle.db, source.id);
          console.log(`${String(count)} orphaned relations of source ${String(source.id)} requeued`);
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}

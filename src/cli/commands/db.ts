import ora from "ora";

import { errorMessage } from "../../errors.js";
import { checkConnection, getPoolStats } from "../../db/connection.js";
import { runMigration, hasSchema, getTableStats } from "../../db/migrate.js";
import { withCliContext } from "../context.js";
import { displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the ingestion tables and per-type views")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        await withCliContext(async ({ handle }) => {
          if (options.fresh === true) {
            spinner.text = "Dropping existing schema...";
          }

          await runMigration(handle.db, {
            dialect: handle.dialect,
            fresh: options.fresh === true,
          });
          spinner.succeed(`Migration completed (${handle.displayUrl})`);

          console.log("\nTables:");
          displayTableStats(await getTableStats(handle.db));
        });
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        await withCliContext(async ({ handle }) => {
          const connected = await checkConnection(handle.db);

          if (!connected) {
            spinner.fail("Database connection failed");
            console.log(`\nDatabase URL: ${handle.displayUrl}`);
            process.exitCode = 1;
            return;
          }

          spinner.succeed("Database connected");
          console.log(`\nDatabase URL: ${handle.displayUrl}`);

          // Pool stats
          const poolStats = getPoolStats(handle);
          if (poolStats !== null) {
            console.log("\nPool statistics:");
            console.log(`  Total connections: ${String(poolStats.totalCount)}`);
            console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
            console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);
          }

          // Check if schema exists
          if (!(await hasSchema(handle.db))) {
            console.log("\nSchema: Not initialized (run 'db migrate')");
            return;
          }

          console.log("\nTable statistics:");
          displayTableStats(await getTableStats(handle.db));
        });
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}

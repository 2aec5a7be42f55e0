import chalk from "chalk";
import { InvalidArgumentError, type Command } from "commander";
import ora from "ora";

import { ConfigError, errorMessage } from "../../errors.js";
import { withCliContext } from "../context.js";
import { displaySourcesTable } from "../utils/display.js";
import { loadKnownSources, selectKnownSources } from "../utils/known-sources.js";

import type { SyncMode } from "../../types/index.js";

// ============================================================================
// Argument Parsers
// ============================================================================

export function parseMode(value: string): SyncMode {
  const mode = value.toUpperCase();
  if (mode !== "FULL" && mode !== "INCREMENTAL") {
    throw new InvalidArgumentError("Expected FULL or INCREMENTAL.");
  }
  return mode;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

// ============================================================================
// Source Commands
// ============================================================================

interface AddOptions {
  name?: string;
  credential?: string;
  timeout?: number;
  retries?: number;
  mode?: SyncMode;
  disabled?: boolean;
}

export function registerSourcesCommand(program: Command): void {
  const sources = program.command("sources").description("Manage OParl sources");

  // sources add
  sources
    .command("add <baseUrl>")
    .description("Register an OParl System endpoint")
    .option("-n, --name <name>", "Display name (defaults to the host name)")
    .option("--credential <token>", "Bearer credential sent with every request")
    .option("--timeout <seconds>", "Request timeout in seconds", parsePositiveInt)
    .option("--retries <count>", "Retries for transient failures", parseNonNegativeInt)
    .option("--mode <mode>", "Default sync mode (FULL|INCREMENTAL)", parseMode)
    .option("--disabled", "Register without scheduling it")
    .action(async (baseUrl: string, options: AddOptions) => {
      const spinner = ora(`Registering ${baseUrl}...`).start();

      try {
        await withCliContext(async ({ service }) => {
          const name = options.name ?? (URL.canParse(baseUrl) ? new URL(baseUrl).host : baseUrl);
          const { source, isNew } = await service.sources.addSource({
            name,
            baseUrl,
            credential: options.credential,
            requestTimeoutSeconds: options.timeout,
            maxRetries: options.retries,
            defaultMode: options.mode,
            enabled: options.disabled !== true,
          });

          if (isNew) {
            spinner.succeed(`Source ${String(source.id)} registered: ${source.name}`);
          } else {
            spinner.info(`Source already registered as ${String(source.id)}: ${source.name}`);
          }
        });
      } catch (error) {
        spinner.fail(`Could not register source: ${errorMessage(error)}`);
        if (error instanceof ConfigError) {
          for (const problem of error.problems) {
            console.log(chalk.red(`  - ${problem}`));
          }
        }
        process.exitCode = 1;
      }
    });

  // sources list
  sources
    .command("list")
    .description("List registered sources")
    .option("--enabled", "Only enabled sources")
    .action(async (options: { enabled?: boolean }) => {
      try {
        await withCliContext(async ({ service }) => {
          const rows = await service.sources.listSources({
            enabledOnly: options.enabled === true,
          });
          if (rows.length === 0) {
            console.log("No sources registered (see 'sources add' or 'sources seed')");
            return;
          }
          displaySourcesTable(rows);
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // sources enable / disable
  for (const [verb, enabled] of [
    ["enable", true],
    ["disable", false],
  ] as const) {
    sources
      .command(`${verb} <sourceId>`)
      .description(`${enabled ? "Include" : "Exclude"} a source in scheduled syncs`)
      .action(async (sourceId: string) => {
        try {
          await withCliContext(async ({ service }) => {
            const source = await service.sources.requireSource(parsePositiveInt(sourceId));
            await service.sources.setEnabled(source.id, enabled);
            console.log(`Source ${String(source.id)} ${verb}d`);
          });
        } catch (error) {
          console.error(chalk.red(`Error: ${errorMessage(error)}`));
          process.exitCode = 1;
        }
      });
  }

  // sources seed
  sources
    .command("seed")
    .description("Register the public OParl endpoints from the bundled catalogue")
    .option("--priority <level>", "Highest priority to include (1 = major cities)", parsePositiveInt, 3)
    .option("--category <category>", "Only municipality, district, state or other")
    .option("--dry-run", "Show what would be registered")
    .action(
      async (options: { priority: number; category?: string; dryRun?: boolean }) => {
        const spinner = ora("Seeding sources...").start();

        try {
          const selected = selectKnownSources(loadKnownSources(), {
            maxPriority: options.priority,
            category: options.category,
          });

          if (options.dryRun === true) {
            spinner.info(`${String(selected.length)} sources selected`);
            for (const entry of selected) {
              console.log(`  [${String(entry.priority)}] ${entry.name}  ${chalk.gray(entry.baseUrl)}`);
            }
            return;
          }

          await withCliContext(async ({ service }) => {
            let added = 0;
            for (const entry of selected) {
              spinner.text = `Registering ${entry.name}...`;
              const { isNew } = await service.sources.addSource({
                name: entry.name,
                baseUrl: entry.baseUrl,
              });
              if (isNew) added++;
            }
            spinner.succeed(
              `${String(added)} sources added, ${String(selected.length - added)} already registered`
            );
          });
        } catch (error) {
          spinner.fail(`Seeding failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );
}

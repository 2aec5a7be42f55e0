/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/migrate.js";
import type { EntityRelation } from "../../db/types.js";
import type { SyncStatus } from "../../services/sync/runs.js";
import type { SourceSnapshot } from "../../services/sync/sources.js";
import type { RunState } from "../../types/index.js";

/**
 * Colour a run state for terminal output
 */
export function formatState(state: RunState): string {
  switch (state) {
    case "SUCCESS":
      return chalk.green(state);
    case "PARTIAL":
      return chalk.yellow(state);
    case "FAILED":
      return chalk.red(state);
    case "RUNNING":
      return chalk.cyan(state);
    case "PENDING":
      return chalk.gray(state);
  }
}

function formatTimestamp(value: string | null): string {
  return value !== null ? value.replace("T", " ").replace(/\.\d{3}Z$/, "Z") : chalk.gray("-");
}

/**
 * Display sources in a formatted table
 */
export function displaySourcesTable(sources: SourceSnapshot[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Name"),
      chalk.cyan("Base URL"),
      chalk.cyan("Mode"),
      chalk.cyan("Enabled"),
      chalk.cyan("High-water mark"),
    ],
    colWidths: [6, 28, 50, 13, 9, 24],
    wordWrap: true,
  });

  for (const source of sources) {
    table.push([
      String(source.id),
      source.name,
      source.baseUrl,
      source.defaultMode,
      source.enabled ? chalk.green("yes") : chalk.gray("no"),
      formatTimestamp(source.highWaterMark),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display one run: header, per-type counters, relations and error samples
 */
export function displayRunStatus(status: SyncStatus, maxErrors = 10): void {
  console.log(
    chalk.bold(
      `\nRun ${String(status.runId)} · source ${String(status.sourceId)} · ${status.mode} · `
    ) + formatState(status.state)
  );
  console.log(`  Requested by: ${status.requestedBy}`);
  console.log(`  Started:      ${formatTimestamp(status.startedAt)}`);
  console.log(`  Finished:     ${formatTimestamp(status.finishedAt)}`);
  console.log(`  Mark used:    ${formatTimestamp(status.highWaterMarkUsed)}`);
  console.log(`  Mark out:     ${formatTimestamp(status.highWaterMarkProduced)}`);

  const table = new CliTable3({
    head: ["Type", "Fetched", "Upserted", "Inserted", "Updated", "Skipped", "Failed"].map(
      (header) => chalk.cyan(header)
    ),
  });
  for (const [entityType, counters] of Object.entries(status.perEntityType)) {
    if (counters === undefined) continue;
    table.push([
      entityType,
      String(counters.fetched),
      String(counters.upserted),
      String(counters.inserted),
      String(counters.updated),
      String(counters.skipped),
      counters.failed > 0 ? chalk.red(String(counters.failed)) : "0",
    ]);
  }
  if (table.length > 0) {
    console.log(table.toString());
  }

  if (status.relations !== null) {
    const { resolved, stillPending, orphaned } = status.relations;
    console.log(
      `  Relations: ${chalk.green(String(resolved))} resolved, ${String(stillPending)} pending, ${orphaned > 0 ? chalk.red(String(orphaned)) : "0"} orphaned`
    );
  }

  const counts = Object.entries(status.errorCounts);
  if (counts.length > 0) {
    console.log(
      chalk.bold("\nErrors: ") +
        counts.map(([kind, count]) => `${kind}=${String(count ?? 0)}`).join(", ")
    );
    for (const sample of status.errors.slice(0, maxErrors)) {
      const where = sample.entityType !== null ? `[${sample.entityType}] ` : "";
      console.log(`  - ${where}${sample.message}`);
    }
    if (status.errors.length > maxErrors) {
      console.log(`  ... and ${String(status.errors.length - maxErrors)} more samples`);
    }
  }
  console.log();
}

/**
 * Display the run history of a source
 */
export function displayRunsTable(runs: SyncStatus[]): void {
  const table = new CliTable3({
    head: ["Run", "Mode", "State", "By", "Started", "Finished", "Errors"].map((header) =>
      chalk.cyan(header)
    ),
  });

  for (const run of runs) {
    const errorTotal = Object.values(run.errorCounts).reduce<number>(
      (sum, count) => sum + (count ?? 0),
      0
    );
    table.push([
      String(run.runId),
      run.mode,
      formatState(run.state),
      run.requestedBy,
      formatTimestamp(run.startedAt),
      formatTimestamp(run.finishedAt),
      String(errorTotal),
    ]);
  }

  console.log(table.toString());
}

export function displayOrphansTable(edges: EntityRelation[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Relation"), chalk.cyan("From"), chalk.cyan("Target"), chalk.cyan("Attempts")],
    colWidths: [30, 10, 70, 10],
    wordWrap: true,
  });

  for (const edge of edges) {
    table.push([
      edge.relation_type,
      String(edge.from_entity_id),
      edge.target_external_id,
      String(edge.unresolved_attempts),
    ]);
  }

  console.log(table.toString());
}

export function displayTableStats(stats: TableStat[]): void {
  for (const row of stats) {
    console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
  }
}

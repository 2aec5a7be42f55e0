import { sql, type ColumnDefinitionBuilder, type Kysely } from "kysely";

import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { ENTITY_TYPES, type EntityType } from "../types/index.js";

import {
  closeConnection,
  createDatabase,
  type DialectKind,
} from "./connection.js";

import type { Database } from "./types.js";

// ============================================================================
// Schema Objects
// ============================================================================

const TABLES = ["sync_runs", "entity_relations", "entities", "sources"] as const;

/**
 * Per-type projections of the entities table, read by downstream consumers
 */
export const ENTITY_VIEWS: Record<EntityType, string> = {
  body: "oparl_bodies",
  legislative_term: "oparl_legislative_terms",
  organization: "oparl_organizations",
  person: "oparl_persons",
  location: "oparl_locations",
  membership: "oparl_memberships",
  meeting: "oparl_meetings",
  paper: "oparl_papers",
  agenda_item: "oparl_agenda_items",
  consultation: "oparl_consultations",
  file: "oparl_files",
};

// ============================================================================
// Migration Functions
// ============================================================================

export interface MigrationOptions {
  dialect: DialectKind;
  fresh?: boolean;
}

/**
 * Create tables, indexes and views. Safe to run repeatedly.
 */
export async function runMigration(
  db: Kysely<Database>,
  options: MigrationOptions
): Promise<void> {
  if (options.fresh === true) {
    logger.info("Dropping existing schema (--fresh mode)...");
    await dropSchema(db);
  }

  logger.info({ dialect: options.dialect }, "Running schema migration...");

  try {
    await db.transaction().execute(async (trx) => {
      await createTables(trx, options.dialect);
      await createIndexes(trx);
      await createViews(trx, options.dialect);
    });
  } catch (error) {
    logger.error({ error }, "Schema migration failed");
    throw error;
  }

  logger.info("Schema migration completed successfully");
}

async function dropSchema(db: Kysely<Database>): Promise<void> {
  for (const view of Object.values(ENTITY_VIEWS)) {
    await db.schema.dropView(view).ifExists().execute();
  }
  for (const table of TABLES) {
    await db.schema.dropTable(table).ifExists().execute();
  }
}

async function createTables(
  db: Kysely<Database>,
  dialect: DialectKind
): Promise<void> {
  // SERIAL on PostgreSQL, INTEGER PRIMARY KEY AUTOINCREMENT on SQLite
  const idType = dialect === "postgres" ? "serial" : "integer";
  const primaryId = (col: ColumnDefinitionBuilder): ColumnDefinitionBuilder =>
    dialect === "postgres" ? col.primaryKey() : col.primaryKey().autoIncrement();

  await db.schema
    .createTable("sources")
    .ifNotExists()
    .addColumn("id", idType, primaryId)
    .addColumn("name", "text", (col) => col.notNull())
    .addColumn("base_url", "text", (col) => col.notNull().unique())
    .addColumn("credential", "text")
    .addColumn("request_timeout_seconds", "integer", (col) =>
      col.notNull().defaultTo(60)
    )
    .addColumn("max_retries", "integer", (col) => col.notNull().defaultTo(5))
    .addColumn("default_mode", "text", (col) =>
      col.notNull().defaultTo("INCREMENTAL")
    )
    .addColumn("enabled", "integer", (col) => col.notNull().defaultTo(1))
    .addColumn("high_water_mark", "text")
    .addColumn("lease_owner", "text")
    .addColumn("lease_expires_at", "text")
    .addColumn("last_run_id", "integer")
    .addColumn("system_payload", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("entities")
    .ifNotExists()
    .addColumn("id", idType, primaryId)
    .addColumn("source_id", "integer", (col) =>
      col.notNull().references("sources.id").onDelete("cascade")
    )
    .addColumn("entity_type", "text", (col) => col.notNull())
    .addColumn("external_id", "text", (col) => col.notNull())
    .addColumn("body_external_id", "text")
    .addColumn("name", "text")
    .addColumn("fields", "text", (col) => col.notNull())
    .addColumn("raw_payload", "text", (col) => col.notNull())
    .addColumn("content_hash", "text", (col) => col.notNull())
    .addColumn("upstream_created_at", "text")
    .addColumn("upstream_modified_at", "text")
    .addColumn("deleted", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addColumn("last_synced_at", "text", (col) => col.notNull())
    .addUniqueConstraint("entities_source_external_unique", [
      "source_id",
      "external_id",
    ])
    .execute();

  await db.schema
    .createTable("entity_relations")
    .ifNotExists()
    .addColumn("id", idType, primaryId)
    .addColumn("source_id", "integer", (col) =>
      col.notNull().references("sources.id").onDelete("cascade")
    )
    .addColumn("relation_type", "text", (col) => col.notNull())
    .addColumn("from_entity_id", "integer", (col) =>
      col.notNull().references("entities.id").onDelete("cascade")
    )
    .addColumn("target_external_id", "text", (col) => col.notNull())
    .addColumn("target_entity_id", "integer", (col) =>
      col.references("entities.id").onDelete("set null")
    )
    .addColumn("status", "text", (col) => col.notNull().defaultTo("PENDING"))
    .addColumn("unresolved_attempts", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("last_attempt_run_id", "integer")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addUniqueConstraint("entity_relations_edge_unique", [
      "source_id",
      "relation_type",
      "from_entity_id",
      "target_external_id",
    ])
    .execute();

  await db.schema
    .createTable("sync_runs")
    .ifNotExists()
    .addColumn("id", idType, primaryId)
    .addColumn("source_id", "integer", (col) =>
      col.notNull().references("sources.id").onDelete("cascade")
    )
    .addColumn("mode", "text", (col) => col.notNull())
    .addColumn("state", "text", (col) => col.notNull().defaultTo("PENDING"))
    .addColumn("requested_by", "text", (col) => col.notNull())
    .addColumn("worker_id", "text")
    .addColumn("counters", "text", (col) => col.notNull().defaultTo("{}"))
    .addColumn("errors", "text", (col) => col.notNull().defaultTo("[]"))
    .addColumn("error_counts", "text", (col) => col.notNull().defaultTo("{}"))
    .addColumn("relations", "text")
    .addColumn("high_water_mark_used", "text")
    .addColumn("high_water_mark_produced", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("started_at", "text")
    .addColumn("finished_at", "text")
    .execute();
}

async function createIndexes(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createIndex("idx_entities_type_synced")
    .ifNotExists()
    .on("entities")
    .columns(["source_id", "entity_type", "last_synced_at"])
    .execute();

  await db.schema
    .createIndex("idx_entities_synced")
    .ifNotExists()
    .on("entities")
    .column("last_synced_at")
    .execute();

  await db.schema
    .createIndex("idx_entity_relations_status")
    .ifNotExists()
    .on("entity_relations")
    .columns(["source_id", "status"])
    .execute();

  await db.schema
    .createIndex("idx_entity_relations_target")
    .ifNotExists()
    .on("entity_relations")
    .column("target_entity_id")
    .execute();

  await db.schema
    .createIndex("idx_sync_runs_source_state")
    .ifNotExists()
    .on("sync_runs")
    .columns(["source_id", "state"])
    .execute();
}

async function createViews(
  db: Kysely<Database>,
  dialect: DialectKind
): Promise<void> {
  for (const entityType of ENTITY_TYPES) {
    const builder = db.schema.createView(ENTITY_VIEWS[entityType]);
    // PostgreSQL has no CREATE VIEW IF NOT EXISTS; SQLite has no OR REPLACE
    const view =
      dialect === "postgres" ? builder.orReplace() : builder.ifNotExists();

    await view
      .as(
        db
          .selectFrom("entities")
          .selectAll()
          .where("entity_type", "=", sql.lit(entityType))
      )
      .execute();
  }
}

// ============================================================================
// Introspection
// ============================================================================

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Row counts for the ingestion tables
 */
export async function getTableStats(db: Kysely<Database>): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of [...TABLES].reverse()) {
    const row = await db
      .selectFrom(table)
      .select((eb) => eb.fn.countAll().as("count"))
      .executeTakeFirstOrThrow();
    stats.push({ table_name: table, row_count: Number(row.count) });
  }
  return stats;
}

/**
 * Check if the schema exists (has the sources table)
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  const tables = await db.introspection.getTables();
  return tables.some((table) => table.name === "sources");
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const fresh = args.includes("--fresh");

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  const handle = createDatabase({ url: loadConfig().databaseUrl });

  try {
    await runMigration(handle.db, { dialect: handle.dialect, fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats(handle.db);
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection(handle);
  }
}

// Only run main() if this file is executed directly (not imported)
const entry = process.argv[1] ?? "";
const isMainModule = /[\\/]migrate\.(ts|js)$/.test(entry);
if (isMainModule) {
  void main();
}

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool } = pg;

export type DialectKind = "postgres" | "sqlite";

export interface DatabaseHandle {
  db: Kysely<Database>;
  dialect: DialectKind;
  /** Connection string with the password masked, for display */
  displayUrl: string;
  pool: pg.Pool | null;
}

export interface DatabaseOptions {
  url: string;
  poolMax?: number;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Decide the dialect from the connection string. `sqlite:` URLs and
 * `:memory:` use better-sqlite3, everything else is handed to pg.
 */
export function resolveDialect(url: string): DialectKind {
  return url.startsWith("sqlite:") || url === ":memory:"
    ? "sqlite"
    : "postgres";
}

function sqlitePath(url: string): string {
  const path = url.replace(/^sqlite:(\/\/)?/, "");
  return path === "" ? ":memory:" : path;
}

/**
 * Get a connection string for display, with password masked
 */
export function maskDatabaseUrl(url: string): string {
  if (resolveDialect(url) === "sqlite") {
    return url;
  }
  try {
    const parsed = new URL(url);
    if (parsed.password !== "") {
      parsed.password = "****";
    }
    return parsed.toString();
  } catch {
    return "<invalid database url>";
  }
}

// ============================================================================
// JSON Columns
// ============================================================================

/**
 * Serialize a value for a JSON text column
 */
export function jsonText<T>(value: T): string {
  return JSON.stringify(value);
}

/**
 * Read a JSON text column written by jsonText
 */
export function parseJsonText<T>(value: string): T {
  return JSON.parse(value);
}

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const dialect = resolveDialect(options.url);

  if (dialect === "sqlite") {
    const path = sqlitePath(options.url);
    if (path !== ":memory:") {
      const dataDir = dirname(path);
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
    }

    const database = new SQLite(path);
    database.pragma("journal_mode = WAL");
    database.pragma("foreign_keys = ON");

    return {
      db: new Kysely<Database>({
        dialect: new SqliteDialect({ database }),
      }),
      dialect,
      displayUrl: maskDatabaseUrl(options.url),
      pool: null,
    };
  }

  const pool = new Pool({
    connectionString: options.url,
    max: options.poolMax ?? 20, // Maximum pool connections
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Connection timeout
  });

  pool.on("error", (error) => {
    dbLogger.error({ error }, "Idle database client error");
  });

  return {
    db: new Kysely<Database>({
      dialect: new PostgresDialect({ pool }),
    }),
    dialect,
    displayUrl: maskDatabaseUrl(options.url),
    pool,
  };
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(handle: DatabaseHandle): Promise<void> {
  try {
    // db.destroy() also ends the pg pool / sqlite handle
    await handle.db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get pool statistics (PostgreSQL only)
 */
export function getPoolStats(handle: DatabaseHandle): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} | null {
  if (handle.pool === null) {
    return null;
  }
  return {
    totalCount: handle.pool.totalCount,
    idleCount: handle.pool.idleCount,
    waitingCount: handle.pool.waitingCount,
  };
}

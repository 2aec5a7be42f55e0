/**
 * Application configuration
 *
 * Built once from environment variables (after `dotenv/config`) and passed
 * explicitly to the components that need it.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const PositiveInt = (defaultValue: number, minimum = 1) =>
  Type.Integer({ minimum, default: defaultValue });

export const AppConfigSchema = Type.Object({
  databaseUrl: Type.String({ minLength: 1 }),
  dbPoolMax: PositiveInt(20),
  port: Type.Integer({ minimum: 0, maximum: 65_535, default: 3000 }),
  host: Type.String({ default: "0.0.0.0" }),
  sync: Type.Object({
    concurrency: PositiveInt(4),
    leaseTtlSeconds: PositiveInt(600),
    orphanAfterRuns: PositiveInt(5),
    pageDelayMs: PositiveInt(100, 0),
    retryBaseDelayMs: PositiveInt(500, 0),
    retryMaxDelayMs: PositiveInt(30_000, 0),
    maxPages: PositiveInt(10_000),
    circuitFailureThreshold: PositiveInt(5),
    circuitRecoveryMs: PositiveInt(60_000, 0),
    circuitSuccessThreshold: PositiveInt(2),
    intervalMinutes: PositiveInt(15),
    fullIntervalHours: PositiveInt(24),
    defaultRequestTimeoutSeconds: PositiveInt(60),
    defaultMaxRetries: PositiveInt(5, 0),
  }),
});

export type AppConfig = Static<typeof AppConfigSchema>;
export type SyncConfig = AppConfig["sync"];

export const DEFAULT_DATABASE_URL = "sqlite:./data/oparl.db";

// ============================================================================
// Loading
// ============================================================================

type Env = Record<string, string | undefined>;

/**
 * Integer variables are parsed here; unset or empty variables fall back to
 * the schema defaults. Non-numeric text is kept as NaN so that validation
 * reports the variable instead of silently using the default.
 */
function readInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return /^-?\d+$/.test(raw.trim()) ? Number.parseInt(raw, 10) : Number.NaN;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

const ENV_NAMES: Record<string, string> = {
  "/databaseUrl": "DATABASE_URL",
  "/dbPoolMax": "DB_POOL_MAX",
  "/port": "PORT",
  "/host": "HOST",
  "/sync/concurrency": "SYNC_CONCURRENCY",
  "/sync/leaseTtlSeconds": "SYNC_LEASE_TTL_SECONDS",
  "/sync/orphanAfterRuns": "SYNC_ORPHAN_AFTER_RUNS",
  "/sync/pageDelayMs": "SYNC_PAGE_DELAY_MS",
  "/sync/retryBaseDelayMs": "SYNC_RETRY_BASE_DELAY_MS",
  "/sync/retryMaxDelayMs": "SYNC_RETRY_MAX_DELAY_MS",
  "/sync/maxPages": "SYNC_MAX_PAGES",
  "/sync/circuitFailureThreshold": "CIRCUIT_BREAKER_FAILURE_THRESHOLD",
  "/sync/circuitRecoveryMs": "CIRCUIT_BREAKER_RECOVERY_MS",
  "/sync/circuitSuccessThreshold": "CIRCUIT_BREAKER_SUCCESS_THRESHOLD",
  "/sync/intervalMinutes": "SYNC_INTERVAL_MINUTES",
  "/sync/fullIntervalHours": "FULL_SYNC_INTERVAL_HOURS",
  "/sync/defaultRequestTimeoutSeconds": "DEFAULT_REQUEST_TIMEOUT_SECONDS",
  "/sync/defaultMaxRetries": "DEFAULT_MAX_RETRIES",
};

export function loadConfig(env: Env = process.env): AppConfig {
  const candidate = Value.Default(AppConfigSchema, {
    databaseUrl: readString(env, "DATABASE_URL") ?? DEFAULT_DATABASE_URL,
    dbPoolMax: readInt(env, "DB_POOL_MAX"),
    port: readInt(env, "PORT"),
    host: readString(env, "HOST"),
    sync: {
      concurrency: readInt(env, "SYNC_CONCURRENCY"),
      leaseTtlSeconds: readInt(env, "SYNC_LEASE_TTL_SECONDS"),
      orphanAfterRuns: readInt(env, "SYNC_ORPHAN_AFTER_RUNS"),
      pageDelayMs: readInt(env, "SYNC_PAGE_DELAY_MS"),
      retryBaseDelayMs: readInt(env, "SYNC_RETRY_BASE_DELAY_MS"),
      retryMaxDelayMs: readInt(env, "SYNC_RETRY_MAX_DELAY_MS"),
      maxPages: readInt(env, "SYNC_MAX_PAGES"),
      circuitFailureThreshold: readInt(env, "CIRCUIT_BREAKER_FAILURE_THRESHOLD"),
      circuitRecoveryMs: readInt(env, "CIRCUIT_BREAKER_RECOVERY_MS"),
      circuitSuccessThreshold: readInt(env, "CIRCUIT_BREAKER_SUCCESS_THRESHOLD"),
      intervalMinutes: readInt(env, "SYNC_INTERVAL_MINUTES"),
      fullIntervalHours: readInt(env, "FULL_SYNC_INTERVAL_HOURS"),
      defaultRequestTimeoutSeconds: readInt(
        env,
        "DEFAULT_REQUEST_TIMEOUT_SECONDS"
      ),
      defaultMaxRetries: readInt(env, "DEFAULT_MAX_RETRIES"),
    },
  });

  if (!Value.Check(AppConfigSchema, candidate)) {
    const problems = [...Value.Errors(AppConfigSchema, candidate)].map(
      (error) =>
        `${ENV_NAMES[error.path] ?? error.path}: ${error.message}`
    );
    throw new ConfigError(
      `Invalid configuration: ${problems.join("; ")}`,
      problems
    );
  }

  return Object.freeze(candidate);
}

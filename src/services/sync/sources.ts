/**
 * SourceRegistry - source configuration, high-water marks and leases
 *
 * A lease is a time-bounded claim on a source row taken by a conditional
 * update, so that only one worker syncs a source at a time even across
 * processes. An expired lease can be taken over by any worker.
 */

import { ConfigError, NotFoundError } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { Database, NewSource, Source } from "../../db/types.js";
import type { SyncMode } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface SourceInput {
  name: string;
  baseUrl: string;
  credential?: string | null;
  requestTimeoutSeconds?: number;
  maxRetries?: number;
  defaultMode?: SyncMode;
  enabled?: boolean;
}

export interface SourceDefaults {
  requestTimeoutSeconds: number;
  maxRetries: number;
}

/**
 * Immutable view of a source row, read once at the start of a run
 */
export interface SourceSnapshot {
  id: number;
  name: string;
  baseUrl: string;
  credential: string | null;
  requestTimeoutSeconds: number;
  maxRetries: number;
  defaultMode: SyncMode;
  enabled: boolean;
  highWaterMark: string | null;
  leaseOwner: string | null;
  leaseExpiresAt: string | null;
  lastRunId: number | null;
  createdAt: string;
  updatedAt: string;
}

export function toSnapshot(row: Source): SourceSnapshot {
  return Object.freeze({
    id: row.id,
    name: row.name,
    baseUrl: row.base_url,
    credential: row.credential,
    requestTimeoutSeconds: row.request_timeout_seconds,
    maxRetries: row.max_retries,
    defaultMode: row.default_mode,
    enabled: row.enabled === 1,
    highWaterMark: row.high_water_mark,
    leaseOwner: row.lease_owner,
    leaseExpiresAt: row.lease_expires_at,
    lastRunId: row.last_run_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function validateInput(input: SourceInput): string[] {
  const problems: string[] = [];
  if (input.name.trim() === "") {
    problems.push("name must not be empty");
  }
  if (!URL.canParse(input.baseUrl)) {
    problems.push(`baseUrl is not a valid URL: ${input.baseUrl}`);
  } else if (!/^https?:$/.test(new URL(input.baseUrl).protocol)) {
    problems.push("baseUrl must use http or https");
  }
  if (input.requestTimeoutSeconds !== undefined && input.requestTimeoutSeconds <= 0) {
    problems.push("requestTimeoutSeconds must be positive");
  }
  if (input.maxRetries !== undefined && input.maxRetries < 0) {
    problems.push("maxRetries must not be negative");
  }
  return problems;
}

// ============================================================================
// SourceRegistry
// ============================================================================

export class SourceRegistry {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly defaults: SourceDefaults = {
      requestTimeoutSeconds: 60,
      maxRetries: 5,
    }
  ) {}

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Register a source, or return the existing one with the same base URL.
   */
  async addSource(
    input: SourceInput
  ): Promise<{ source: SourceSnapshot; isNew: boolean }> {
    const problems = validateInput(input);
    if (problems.length > 0) {
      throw new ConfigError(`Invalid source: ${problems.join("; ")}`, problems);
    }

    const existing = await this.db
      .selectFrom("sources")
      .selectAll()
      .where("base_url", "=", input.baseUrl)
      .executeTakeFirst();

    if (existing !== undefined) {
      return { source: toSnapshot(existing), isNew: false };
    }

    const now = new Date().toISOString();
    const row: NewSource = {
      name: input.name.trim(),
      base_url: input.baseUrl,
      credential: input.credential ?? null,
      request_timeout_seconds:
        input.requestTimeoutSeconds ?? this.defaults.requestTimeoutSeconds,
      max_retries: input.maxRetries ?? this.defaults.maxRetries,
      default_mode: input.defaultMode ?? "INCREMENTAL",
      enabled: input.enabled === false ? 0 : 1,
      high_water_mark: null,
      lease_owner: null,
      lease_expires_at: null,
      last_run_id: null,
      system_payload: null,
      created_at: now,
      updated_at: now,
    };

    const created = await this.db
      .insertInto("sources")
      .values(row)
      .returningAll()
      .executeTakeFirstOrThrow();

    syncLogger.info(
      { sourceId: created.id, baseUrl: created.base_url },
      "Registered source"
    );

    return { source: toSnapshot(created), isNew: true };
  }

  async getSource(sourceId: number): Promise<SourceSnapshot | null> {
    const row = await this.db
      .selectFrom("sources")
      .selectAll()
      .where("id", "=", sourceId)
      .executeTakeFirst();
    return row !== undefined ? toSnapshot(row) : null;
  }

  async requireSource(sourceId: number): Promise<SourceSnapshot> {
    const source = await this.getSource(sourceId);
    if (source === null) {
      throw new NotFoundError("source", sourceId);
    }
    return source;
  }

  async listSources(filters?: { enabledOnly?: boolean }): Promise<SourceSnapshot[]> {
    let query = this.db.selectFrom("sources").selectAll().orderBy("id");
    if (filters?.enabledOnly === true) {
      query = query.where("enabled", "=", 1);
    }
    const rows = await query.execute();
    return rows.map(toSnapshot);
  }

  async setEnabled(sourceId: number, enabled: boolean): Promise<void> {
    await this.db
      .updateTable("sources")
      .set({ enabled: enabled ? 1 : 0, updated_at: new Date().toISOString() })
      .where("id", "=", sourceId)
      .execute();
  }

  // ==========================================================================
  // Run Bookkeeping
  // ==========================================================================

  /**
   * Move the high-water mark after a SUCCESS or PARTIAL run
   */
  async advanceHighWaterMark(
    sourceId: number,
    highWaterMark: string,
    runId: number
  ): Promise<void> {
    await this.db
      .updateTable("sources")
      .set({
        high_water_mark: highWaterMark,
        last_run_id: runId,
        updated_at: new Date().toISOString(),
      })
      .where("id", "=", sourceId)
      .execute();

    syncLogger.info({ sourceId, runId, highWaterMark }, "Advanced high-water mark");
  }

  async setLastRun(sourceId: number, runId: number): Promise<void> {
    await this.db
      .updateTable("sources")
      .set({ last_run_id: runId })
      .where("id", "=", sourceId)
      .execute();
  }

  async saveSystemPayload(sourceId: number, payload: string): Promise<void> {
    await this.db
      .updateTable("sources")
      .set({ system_payload: payload })
      .where("id", "=", sourceId)
      .execute();
  }

  // ==========================================================================
  // Leases
  // ==========================================================================

  /**
   * Take the lease when it is free, expired or already held by `owner`.
   */
  async acquireLease(
    sourceId: number,
    owner: string,
    ttlSeconds: number,
    now: Date = new Date()
  ): Promise<boolean> {
    const nowIso = now.toISOString();
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000).toISOString();

    const result = await this.db
      .updateTable("sources")
      .set({ lease_owner: owner, lease_expires_at: expiresAt })
      .where("id", "=", sourceId)
      .where((eb) =>
        eb.or([
          eb("lease_owner", "is", null),
          eb("lease_expires_at", "is", null),
          eb("lease_expires_at", "<", nowIso),
          eb("lease_owner", "=", owner),
        ])
      )
      .executeTakeFirst();

    const acquired = Number(result.numUpdatedRows) === 1;
    syncLogger.debug({ sourceId, owner, acquired, expiresAt }, "Lease acquisition");
    return acquired;
  }

  /**
   * Extend a lease still held by `owner`. False when it was lost.
   */
  async renewLease(
    sourceId: number,
    owner: string,
    ttlSeconds: number,
    now: Date = new Date()
  ): Promise<boolean> {
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000).toISOString();
    const result = await this.db
      .updateTable("sources")
      .set({ lease_expires_at: expiresAt })
      .where("id", "=", sourceId)
      .where("lease_owner", "=", owner)
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  async releaseLease(sourceId: number, owner: string): Promise<void> {
    await this.db
      .updateTable("sources")
      .set({ lease_owner: null, lease_expires_at: null })
      .where("id", "=", sourceId)
      .where("lease_owner", "=", owner)
      .execute();
  }
}

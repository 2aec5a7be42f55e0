/**
 * Upsert Module - Idempotent persistence of canonical records
 *
 * Records are keyed by (source_id, external_id). The content hash decides
 * whether a re-fetched record is written again or only marked as seen.
 */

import { jsonText, parseJsonText } from "../../db/connection.js";
import { StorageError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import { recordEdges } from "./relations.js";

import type { Database, Entity, NewEntity } from "../../db/types.js";
import type {
  CanonicalRecord,
  EntityType,
  JsonObject,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export type UpsertOutcome = "inserted" | "updated" | "unchanged";

export interface UpsertResult {
  id: number;
  outcome: UpsertOutcome;
}

export interface BatchEntry {
  record: CanonicalRecord;
  result: UpsertResult;
}

export interface BatchFailure {
  record: CanonicalRecord;
  error: StorageError;
}

export interface BatchResult {
  written: BatchEntry[];
  failures: BatchFailure[];
}

// ============================================================================
// Single Record
// ============================================================================

/**
 * Insert or update one record inside the caller's transaction. Edges are
 * only rewritten when the content changed.
 */
export async function upsertEntity(
  trx: Kysely<Database>,
  sourceId: number,
  record: CanonicalRecord,
  now: string
): Promise<UpsertResult> {
  const existing = await trx
    .selectFrom("entities")
    .select(["id", "entity_type", "content_hash"])
    .where("source_id", "=", sourceId)
    .where("external_id", "=", record.externalId)
    .executeTakeFirst();

  if (existing === undefined) {
    const row: NewEntity = {
      source_id: sourceId,
      entity_type: record.entityType,
      external_id: record.externalId,
      body_external_id: record.bodyExternalId,
      name: record.name,
      fields: jsonText(record.fields),
      raw_payload: jsonText(record.rawPayload),
      content_hash: record.contentHash,
      upstream_created_at: record.upstreamCreatedAt,
      upstream_modified_at: record.upstreamModifiedAt,
      deleted: record.deleted ? 1 : 0,
      created_at: now,
      updated_at: now,
      last_synced_at: now,
    };
    const inserted = await trx
      .insertInto("entities")
      .values(row)
      .returning("id")
      .executeTakeFirstOrThrow();

    await recordEdges(trx, sourceId, inserted.id, record.references, now);
    return { id: inserted.id, outcome: "inserted" };
  }

  if (existing.entity_type !== record.entityType) {
    throw new StorageError(
      `${record.externalId} is already stored as ${existing.entity_type}`,
      record.entityType,
      record.externalId
    );
  }

  if (existing.content_hash === record.contentHash) {
    await trx
      .updateTable("entities")
      .set({ last_synced_at: now })
      .where("id", "=", existing.id)
      .execute();
    return { id: existing.id, outcome: "unchanged" };
  }

  await trx
    .updateTable("entities")
    .set({
      body_external_id: record.bodyExternalId,
      name: record.name,
      fields: jsonText(record.fields),
      raw_payload: jsonText(record.rawPayload),
      content_hash: record.contentHash,
      upstream_created_at: record.upstreamCreatedAt,
      upstream_modified_at: record.upstreamModifiedAt,
      deleted: record.deleted ? 1 : 0,
      updated_at: now,
      last_synced_at: now,
    })
    .where("id", "=", existing.id)
    .execute();

  await recordEdges(trx, sourceId, existing.id, record.references, now);
  return { id: existing.id, outcome: "updated" };
}

// ============================================================================
// Batches
// ============================================================================

async function writeAll(
  db: Kysely<Database>,
  sourceId: number,
  records: CanonicalRecord[],
  now: string
): Promise<BatchEntry[]> {
  return db.transaction().execute(async (trx) => {
    const written: BatchEntry[] = [];
    for (const record of records) {
      written.push({
        record,
        result: await upsertEntity(trx, sourceId, record, now),
      });
    }
    return written;
  });
}

function toStorageError(record: CanonicalRecord, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(
    `Failed to store ${record.entityType} ${record.externalId}: ${errorMessage(error)}`,
    record.entityType,
    record.externalId,
    { cause: error }
  );
}

/**
 * Write one batch (typically the records of one page) in a single
 * transaction. A failing batch is retried once, then split so that each
 * record commits on its own and only the failing ones are reported. When
 * every record fails the batch raises a StorageError.
 */
export async function commitBatch(
  db: Kysely<Database>,
  sourceId: number,
  records: CanonicalRecord[],
  now: string
): Promise<BatchResult> {
  if (records.length === 0) {
    return { written: [], failures: [] };
  }

  for (let attempt = 1; attempt <= 2; attempt++) {
    try {
      return { written: await writeAll(db, sourceId, records, now), failures: [] };
    } catch (error) {
      syncLogger.warn(
        { sourceId, attempt, records: records.length, error: errorMessage(error) },
        "Batch commit failed"
      );
    }
  }

  // Isolate the failing records
  const written: BatchEntry[] = [];
  const failures: BatchFailure[] = [];
  for (const record of records) {
    try {
      const [entry] = await writeAll(db, sourceId, [record], now);
      if (entry !== undefined) {
        written.push(entry);
      }
    } catch (error) {
      const storageError = toStorageError(record, error);
      syncLogger.error(
        {
          sourceId,
          entityType: record.entityType,
          externalId: record.externalId,
          error: storageError.message,
        },
        "Record could not be stored"
      );
      failures.push({ record, error: storageError });
    }
  }

  if (written.length === 0) {
    const first = failures[0];
    throw new StorageError(
      `Every record of the batch failed to store${first !== undefined ? `: ${first.error.message}` : ""}`,
      first?.record.entityType ?? null,
      null,
      { cause: first?.error }
    );
  }

  return { written, failures };
}

// ============================================================================
// Queries
// ============================================================================

export interface StoredEntity {
  id: number;
  sourceId: number;
  entityType: EntityType;
  externalId: string;
  bodyExternalId: string | null;
  name: string | null;
  fields: JsonObject;
  rawPayload: JsonObject;
  contentHash: string;
  upstreamCreatedAt: string | null;
  upstreamModifiedAt: string | null;
  deleted: boolean;
  createdAt: string;
  updatedAt: string;
  lastSyncedAt: string;
}

export function decodeEntity(row: Entity): StoredEntity {
  return {
    id: row.id,
    sourceId: row.source_id,
    entityType: row.entity_type,
    externalId: row.external_id,
    bodyExternalId: row.body_external_id,
    name: row.name,
    fields: parseJsonText<JsonObject>(row.fields),
    rawPayload: parseJsonText<JsonObject>(row.raw_payload),
    contentHash: row.content_hash,
    upstreamCreatedAt: row.upstream_created_at,
    upstreamModifiedAt: row.upstream_modified_at,
    deleted: row.deleted === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastSyncedAt: row.last_synced_at,
  };
}

export async function getEntity(
  db: Kysely<Database>,
  sourceId: number,
  externalId: string
): Promise<StoredEntity | null> {
  const row = await db
    .selectFrom("entities")
    .selectAll()
    .where("source_id", "=", sourceId)
    .where("external_id", "=", externalId)
    .executeTakeFirst();
  return row !== undefined ? decodeEntity(row) : null;
}

export interface SyncedSinceQuery {
  sourceId?: number;
  entityType?: EntityType;
  /** Exclusive lower bound on last_synced_at */
  since: string;
  limit?: number;
}

/**
 * Records touched by a sync after `since`, oldest first, for downstream
 * consumers polling by watermark
 */
export async function listSyncedSince(
  db: Kysely<Database>,
  query: SyncedSinceQuery
): Promise<StoredEntity[]> {
  let builder = db
    .selectFrom("entities")
    .selectAll()
    .where("last_synced_at", ">", query.since)
    .orderBy("last_synced_at")
    .orderBy("id")
    .limit(query.limit ?? 1000);

  if (query.sourceId !== undefined) {
    builder = builder.where("source_id", "=", query.sourceId);
  }
  if (query.entityType !== undefined) {
    builder = builder.where("entity_type", "=", query.entityType);
  }

  const rows = await builder.execute();
  return rows.map(decodeEntity);
}

export async function countEntitiesByType(
  db: Kysely<Database>,
  sourceId: number
): Promise<Partial<Record<EntityType, number>>> {
  const rows = await db
    .selectFrom("entities")
    .select(["entity_type", (eb) => eb.fn.countAll().as("count")])
    .where("source_id", "=", sourceId)
    .groupBy("entity_type")
    .execute();

  const counts: Partial<Record<EntityType, number>> = {};
  for (const row of rows) {
    counts[row.entity_type] = Number(row.count);
  }
  return counts;
}

/**
 * Relation Resolver
 *
 * Outgoing references are stored as edges keyed by the target's external
 * id. Phase 1 records them while entities are written; phase 2 resolves the
 * pending ones against the entities of the same source once a run has
 * attempted every entity type.
 */

import { syncLogger } from "../../logger.js";

import type {
  Database,
  EntityRelation,
  NewEntityRelation,
} from "../../db/types.js";
import type {
  EntityReference,
  RelationSummary,
  RelationType,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ORPHAN_AFTER_RUNS = 5;

/** Target ids looked up per query */
const LOOKUP_BATCH_SIZE = 500;

function edgeKey(relationType: RelationType, targetExternalId: string): string {
  return `${relationType}\u0000${targetExternalId}`;
}

// ============================================================================
// Phase 1: record edges
// ============================================================================

/**
 * Make the stored edges of `fromEntityId` match `references`: new edges are
 * added as PENDING, existing ones keep their status, edges the record no
 * longer references are removed.
 */
export async function recordEdges(
  trx: Kysely<Database>,
  sourceId: number,
  fromEntityId: number,
  references: EntityReference[],
  now: string
): Promise<void> {
  const existing = await trx
    .selectFrom("entity_relations")
    .select(["id", "relation_type", "target_external_id"])
    .where("from_entity_id", "=", fromEntityId)
    .execute();

  const wanted = new Set(
    references.map((ref) => edgeKey(ref.relationType, ref.targetExternalId))
  );
  const present = new Set<string>();
  const stale: number[] = [];

  for (const edge of existing) {
    const key = edgeKey(edge.relation_type, edge.target_external_id);
    if (wanted.has(key)) {
      present.add(key);
    } else {
      stale.push(edge.id);
    }
  }

  if (stale.length > 0) {
    await trx.deleteFrom("entity_relations").where("id", "in", stale).execute();
  }

  const additions: NewEntityRelation[] = [];
  for (const ref of references) {
    const key = edgeKey(ref.relationType, ref.targetExternalId);
    if (present.has(key)) {
      continue;
    }
    present.add(key);
    additions.push({
      source_id: sourceId,
      relation_type: ref.relationType,
      from_entity_id: fromEntityId,
      target_external_id: ref.targetExternalId,
      target_entity_id: null,
      status: "PENDING",
      unresolved_attempts: 0,
      last_attempt_run_id: null,
      created_at: now,
      updated_at: now,
    });
  }

  if (additions.length > 0) {
    await trx
      .insertInto("entity_relations")
      .values(additions)
      .onConflict((oc) =>
        oc
          .columns([
            "source_id",
            "relation_type",
            "from_entity_id",
            "target_external_id",
          ])
          .doNothing()
      )
      .execute();
  }
}

// ============================================================================
// Phase 2: resolve pending edges
// ============================================================================

export interface ResolveOptions {
  runId: number | null;
  orphanAfterRuns?: number;
  now?: string;
  onOrphaned?: (edge: EntityRelation) => void;
}

export interface ResolveResult extends RelationSummary {
  orphanedEdges: EntityRelation[];
}

export async function resolvePending(
  db: Kysely<Database>,
  sourceId: number,
  options: ResolveOptions
): Promise<ResolveResult> {
  const orphanAfterRuns = options.orphanAfterRuns ?? DEFAULT_ORPHAN_AFTER_RUNS;
  const now = options.now ?? new Date().toISOString();

  const pending = await db
    .selectFrom("entity_relations")
    .selectAll()
    .where("source_id", "=", sourceId)
    .where("status", "=", "PENDING")
    .orderBy("id")
    .execute();

  const result: ResolveResult = {
    resolved: 0,
    stillPending: 0,
    orphaned: 0,
    orphanedEdges: [],
  };

  if (pending.length === 0) {
    return result;
  }

  // Batched lookup of every distinct target within the source
  const targets = [...new Set(pending.map((edge) => edge.target_external_id))];
  const idsByExternal = new Map<string, number>();
  for (let i = 0; i < targets.length; i += LOOKUP_BATCH_SIZE) {
    const rows = await db
      .selectFrom("entities")
      .select(["id", "external_id"])
      .where("source_id", "=", sourceId)
      .where("external_id", "in", targets.slice(i, i + LOOKUP_BATCH_SIZE))
      .execute();
    for (const row of rows) {
      idsByExternal.set(row.external_id, row.id);
    }
  }

  await db.transaction().execute(async (trx) => {
    for (const edge of pending) {
      const targetId = idsByExternal.get(edge.target_external_id);

      if (targetId !== undefined) {
        await trx
          .updateTable("entity_relations")
          .set({
            status: "RESOLVED",
            target_entity_id: targetId,
            last_attempt_run_id: options.runId,
            updated_at: now,
          })
          .where("id", "=", edge.id)
          .execute();
        result.resolved++;
        continue;
      }

      const attempts = edge.unresolved_attempts + 1;
      const orphaned = attempts >= orphanAfterRuns;
      const updated = await trx
        .updateTable("entity_relations")
        .set({
          status: orphaned ? "ORPHANED" : "PENDING",
          unresolved_attempts: attempts,
          last_attempt_run_id: options.runId,
          updated_at: now,
        })
        .where("id", "=", edge.id)
        .returningAll()
        .executeTakeFirstOrThrow();

      if (orphaned) {
        result.orphaned++;
        result.orphanedEdges.push(updated);
      } else {
        result.stillPending++;
      }
    }
  });

  for (const edge of result.orphanedEdges) {
    syncLogger.warn(
      {
        sourceId,
        relationType: edge.relation_type,
        fromEntityId: edge.from_entity_id,
        targetExternalId: edge.target_external_id,
        attempts: edge.unresolved_attempts,
      },
      "Relation orphaned"
    );
    options.onOrphaned?.(edge);
  }

  syncLogger.info(
    {
      sourceId,
      runId: options.runId,
      resolved: result.resolved,
      stillPending: result.stillPending,
      orphaned: result.orphaned,
    },
    "Relation resolution finished"
  );

  return result;
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Outgoing edges of an entity
 */
export async function listEdges(
  db: Kysely<Database>,
  entityId: number
): Promise<EntityRelation[]> {
  return db
    .selectFrom("entity_relations")
    .selectAll()
    .where("from_entity_id", "=", entityId)
    .orderBy("relation_type")
    .orderBy("target_external_id")
    .execute();
}

export async function listOrphans(
  db: Kysely<Database>,
  sourceId: number,
  options: { limit?: number; offset?: number } = {}
): Promise<EntityRelation[]> {
  return db
    .selectFrom("entity_relations")
    .selectAll()
    .where("source_id", "=", sourceId)
    .where("status", "=", "ORPHANED")
    .orderBy("id")
    .limit(options.limit ?? 100)
    .offset(options.offset ?? 0)
    .execute();
}

/**
 * Put orphaned edges of a source back into resolution with a fresh counter
 */
export async function requeueOrphans(
  db: Kysely<Database>,
  sourceId: number
): Promise<number> {
  const result = await db
    .updateTable("entity_relations")
    .set({
      status: "PENDING",
      unresolved_attempts: 0,
      updated_at: new Date().toISOString(),
    })
    .where("source_id", "=", sourceId)
    .where("status", "=", "ORPHANED")
    .executeTakeFirst();

  const count = Number(result.numUpdatedRows);
  syncLogger.info({ sourceId, count }, "Requeued orphaned relations");
  return count;
}

export async function countRelationsByStatus(
  db: Kysely<Database>,
  sourceId: number
): Promise<RelationSummary> {
  const rows = await db
    .selectFrom("entity_relations")
    .select(["status", (eb) => eb.fn.countAll().as("count")])
    .where("source_id", "=", sourceId)
    .groupBy("status")
    .execute();

  const summary: RelationSummary = { resolved: 0, stillPending: 0, orphaned: 0 };
  for (const row of rows) {
    const count = Number(row.count);
    if (row.status === "RESOLVED") summary.resolved = count;
    else if (row.status === "PENDING") summary.stillPending = count;
    else summary.orphaned = count;
  }
  return summary;
}

/**
 * Response Schemas with Examples for OpenAPI Documentation
 */

import { Type } from "@sinclair/typebox";

import {
  NullableDateTime,
  NullableString,
  RunStateSchema,
  SyncModeSchema,
  createListResponseSchema,
  createResponseSchema,
} from "./common.js";

// ============================================================================
// Source Schemas
// ============================================================================

export const SourceSchema = Type.Object(
  {
    id: Type.Integer(),
    name: Type.String(),
    baseUrl: Type.String(),
    hasCredential: Type.Boolean(),
    requestTimeoutSeconds: Type.Integer(),
    maxRetries: Type.Integer(),
    defaultMode: SyncModeSchema,
    enabled: Type.Boolean(),
    highWaterMark: NullableDateTime,
    lastRunId: Type.Union([Type.Integer(), Type.Null()]),
    leaseOwner: NullableString,
    leaseExpiresAt: NullableDateTime,
    createdAt: Type.String({ format: "date-time" }),
    updatedAt: Type.String({ format: "date-time" }),
  },
  {
    examples: [
      {
        id: 1,
        name: "Stadt Musterstadt",
        baseUrl: "https://oparl.example.org/oparl/v1/system",
        hasCredential: false,
        requestTimeoutSeconds: 60,
        maxRetries: 5,
        defaultMode: "INCREMENTAL",
        enabled: true,
        highWaterMark: "2026-03-01T04:00:00.000Z",
        lastRunId: 12,
        leaseOwner: null,
        leaseExpiresAt: null,
        createdAt: "2026-01-10T09:30:00.000Z",
        updatedAt: "2026-03-01T04:07:12.000Z",
      },
    ],
  }
);

export const SourceListResponseSchema = createListResponseSchema(SourceSchema);

export const CreateSourceBodySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  baseUrl: Type.String({ minLength: 1 }),
  credential: Type.Optional(Type.String()),
  requestTimeoutSeconds: Type.Optional(Type.Integer({ minimum: 1 })),
  maxRetries: Type.Optional(Type.Integer({ minimum: 0 })),
  defaultMode: Type.Optional(SyncModeSchema),
  enabled: Type.Optional(Type.Boolean()),
});

export const CreateSourceResponseSchema = createResponseSchema(
  Type.Object({
    source: SourceSchema,
    isNew: Type.Boolean(),
  })
);

// ============================================================================
// Sync Run Schemas
// ============================================================================

export const EntityCountersSchema = Type.Object({
  fetched: Type.Integer(),
  upserted: Type.Integer(),
  skipped: Type.Integer(),
  failed: Type.Integer(),
  inserted: Type.Integer(),
  updated: Type.Integer(),
});

export const RunErrorSampleSchema = Type.Object({
  kind: Type.String(),
  entityType: NullableString,
  message: Type.String(),
  url: Type.Optional(Type.String()),
  externalId: Type.Optional(Type.String()),
  at: Type.String({ format: "date-time" }),
});

export const RelationSummarySchema = Type.Object({
  resolved: Type.Integer(),
  stillPending: Type.Integer(),
  orphaned: Type.Integer(),
});

export const SyncStatusSchema = Type.Object(
  {
    runId: Type.Integer(),
    sourceId: Type.Integer(),
    mode: SyncModeSchema,
    state: RunStateSchema,
    requestedBy: Type.String(),
    workerId: NullableString,
    perEntityType: Type.Record(Type.String(), EntityCountersSchema),
    errors: Type.Array(RunErrorSampleSchema),
    errorCounts: Type.Record(Type.String(), Type.Integer()),
    relations: Type.Union([RelationSummarySchema, Type.Null()]),
    createdAt: Type.String({ format: "date-time" }),
    startedAt: NullableDateTime,
    finishedAt: NullableDateTime,
    highWaterMarkUsed: NullableDateTime,
    highWaterMarkProduced: NullableDateTime,
  },
  {
    examples: [
      {
        runId: 12,
        sourceId: 1,
        mode: "INCREMENTAL",
        state: "PARTIAL",
        requestedBy: "scheduler",
        workerId: "worker-1-4242-k3j9xa",
        perEntityType: {
          meeting: { fetched: 40, upserted: 40, skipped: 0, failed: 0, inserted: 3, updated: 5 },
          file: { fetched: 0, upserted: 0, skipped: 0, failed: 0, inserted: 0, updated: 0 },
        },
        errors: [
          {
            kind: "fetch",
            entityType: "file",
            message: "HTTP 500 after 6 attempts",
            url: "https://oparl.example.org/oparl/v1/body/1/files",
            at: "2026-03-01T04:05:00.000Z",
          },
        ],
        errorCounts: { fetch: 1 },
        relations: { resolved: 120, stillPending: 2, orphaned: 0 },
        createdAt: "2026-03-01T04:00:00.000Z",
        startedAt: "2026-03-01T04:00:00.100Z",
        finishedAt: "2026-03-01T04:07:12.000Z",
        highWaterMarkUsed: "2026-02-28T04:00:00.000Z",
        highWaterMarkProduced: "2026-03-01T04:00:00.100Z",
      },
    ],
  }
);

export const SyncStatusResponseSchema = createResponseSchema(SyncStatusSchema);

export const SyncStatusListResponseSchema = createListResponseSchema(SyncStatusSchema);

export const StartSyncBodySchema = Type.Object({
  mode: Type.Optional(SyncModeSchema),
});

export const StartSyncResponseSchema = createResponseSchema(
  Type.Object({
    runId: Type.Integer(),
    sourceId: Type.Integer(),
    mode: SyncModeSchema,
    state: RunStateSchema,
    isNew: Type.Boolean(),
    message: Type.String(),
  })
);

// ============================================================================
// Relation Schemas
// ============================================================================

export const OrphanSchema = Type.Object({
  id: Type.Integer(),
  relationType: Type.String(),
  fromEntityId: Type.Integer(),
  targetExternalId: Type.String(),
  unresolvedAttempts: Type.Integer(),
  lastAttemptRunId: Type.Union([Type.Integer(), Type.Null()]),
  updatedAt: Type.String({ format: "date-time" }),
});

export const OrphanListResponseSchema = createListResponseSchema(OrphanSchema);

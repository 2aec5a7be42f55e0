/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 200, default: 20 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

export type PaginationQuery = Static<typeof PaginationQuerySchema>;

export const PaginationMetaSchema = Type.Object({
  limit: Type.Integer(),
  offset: Type.Integer(),
  hasMore: Type.Boolean(),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Optional(
      Type.Object({
        pagination: PaginationMetaSchema,
      })
    ),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const NullableString = Type.Union([Type.String(), Type.Null()]);

export const NullableDateTime = Type.Union([
  Type.String({ format: "date-time" }),
  Type.Null(),
]);

export const SyncModeSchema = Type.Union([
  Type.Literal("FULL"),
  Type.Literal("INCREMENTAL"),
]);

export const RunStateSchema = Type.Union([
  Type.Literal("PENDING"),
  Type.Literal("RUNNING"),
  Type.Literal("SUCCESS"),
  Type.Literal("PARTIAL"),
  Type.Literal("FAILED"),
]);

// ============================================================================
// ID Parameter Schemas
// ============================================================================

export const SourceIdParamSchema = Type.Object({
  sourceId: Type.Integer({ minimum: 1 }),
});

export type SourceIdParam = Static<typeof SourceIdParamSchema>;

export const RunIdParamSchema = Type.Object({
  runId: Type.Integer({ minimum: 1 }),
});

export type RunIdParam = Static<typeof RunIdParamSchema>;

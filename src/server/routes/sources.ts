/**
 * Source API Routes
 *
 * Source registration and sync triggers. A source that already has a run
 * pending or running gets that run back instead of a duplicate.
 */

import { type Static } from "@sinclair/typebox";

import { toSyncStatus } from "../../services/sync/runs.js";
import {
  PaginationQuerySchema,
  SourceIdParamSchema,
  type PaginationQuery,
  type SourceIdParam,
} from "../schemas/common.js";
import {
  CreateSourceBodySchema,
  CreateSourceResponseSchema,
  SourceListResponseSchema,
  StartSyncBodySchema,
  StartSyncResponseSchema,
  SyncStatusListResponseSchema,
} from "../schemas/responses.js";

import type { SourceSnapshot } from "../../services/sync/sources.js";
import type { SourceDto } from "../../types/api.js";
import type { ApiDependencies } from "./index.js";
import type { FastifyInstance } from "fastify";

type CreateSourceBody = Static<typeof CreateSourceBodySchema>;
type StartSyncBody = Static<typeof StartSyncBodySchema>;

// ============================================================================
// Helper Functions
// ============================================================================

export function formatSource(source: SourceSnapshot): SourceDto {
  return {
    id: source.id,
    name: source.name,
    baseUrl: source.baseUrl,
    hasCredential: source.credential !== null,
    requestTimeoutSeconds: source.requestTimeoutSeconds,
    maxRetries: source.maxRetries,
    defaultMode: source.defaultMode,
    enabled: source.enabled,
    highWaterMark: source.highWaterMark,
    lastRunId: source.lastRunId,
    leaseOwner: source.leaseOwner,
    leaseExpiresAt: source.leaseExpiresAt,
    createdAt: source.createdAt,
    updatedAt: source.updatedAt,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerSourceRoutes(app: FastifyInstance, deps: ApiDependencies): void {
  const { service } = deps;

  // GET /sources - List registered sources
  app.get(
    "/sources",
    {
      schema: {
        summary: "List sources",
        description: "Returns every registered OParl source",
        tags: ["Sources"],
        response: {
          200: SourceListResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const sources = await service.sources.listSources();
      return reply.send({ data: sources.map(formatSource) });
    }
  );

  // POST /sources - Register a source
  app.post<{ Body: CreateSourceBody }>(
    "/sources",
    {
      schema: {
        summary: "Register source",
        description:
          "Registers an OParl System endpoint. A source with the same base URL is returned unchanged.",
        tags: ["Sources"],
        body: CreateSourceBodySchema,
        response: {
          200: CreateSourceResponseSchema,
          201: CreateSourceResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { source, isNew } = await service.sources.addSource(request.body);
      return reply.status(isNew ? 201 : 200).send({
        data: { source: formatSource(source), isNew },
      });
    }
  );

  // POST /sources/:sourceId/sync - Trigger a sync run
  app.post<{ Params: SourceIdParam; Body: StartSyncBody }>(
    "/sources/:sourceId/sync",
    {
      schema: {
        summary: "Start sync",
        description:
          "Queues a sync run for the source. If a run is already pending or running, returns that run.",
        tags: ["Sync"],
        params: SourceIdParamSchema,
        body: StartSyncBodySchema,
        response: {
          200: StartSyncResponseSchema,
          202: StartSyncResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const result = await service.startSync(request.params.sourceId, {
        mode: request.body.mode,
        requestedBy: "api",
      });

      const message = result.isNew
        ? `Sync run ${String(result.runId)} queued for source ${String(result.sourceId)}`
        : `Sync run ${String(result.runId)} already ${result.state.toLowerCase()} for source ${String(result.sourceId)}`;

      return reply.status(result.isNew ? 202 : 200).send({
        data: { ...result, message },
      });
    }
  );

  // GET /sources/:sourceId/runs - Run history
  app.get<{ Params: SourceIdParam; Querystring: PaginationQuery }>(
    "/sources/:sourceId/runs",
    {
      schema: {
        summary: "List sync runs",
        description: "Returns the runs of a source, newest first",
        tags: ["Sync"],
        params: SourceIdParamSchema,
        querystring: PaginationQuerySchema,
        response: {
          200: SyncStatusListResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { limit = 20, offset = 0 } = request.query;
      const source = await service.sources.requireSource(request.params.sourceId);

      // Fetch one extra to determine hasMore
      const runs = await service.runs.listRuns(source.id, { limit: limit + 1, offset });

      return reply.send({
        data: runs.slice(0, limit).map(toSyncStatus),
        meta: {
          pagination: { limit, offset, hasMore: runs.length > limit },
        },
      });
    }
  );
}

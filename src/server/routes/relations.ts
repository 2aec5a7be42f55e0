/**
 * Relation API Routes
 */

import { listOrphans } from "../../services/sync/relations.js";
import {
  PaginationQuerySchema,
  SourceIdParamSchema,
  type PaginationQuery,
  type SourceIdParam,
} from "../schemas/common.js";
import { OrphanListResponseSchema } from "../schemas/responses.js";

import type { EntityRelation } from "../../db/types.js";
import type { OrphanDto } from "../../types/api.js";
import type { ApiDependencies } from "./index.js";
import type { FastifyInstance } from "fastify";

function formatOrphan(edge: EntityRelation): OrphanDto {
  return {
    id: edge.id,
    relationType: edge.relation_type,
    fromEntityId: edge.from_entity_id,
    targetExternalId: edge.target_external_id,
    unresolvedAttempts: edge.unresolved_attempts,
    lastAttemptRunId: edge.last_attempt_run_id,
    updatedAt: edge.updated_at,
  };
}

export function registerRelationRoutes(app: FastifyInstance, deps: ApiDependencies): void {
  // GET /sources/:sourceId/orphans - Edges given up on
  app.get<{ Params: SourceIdParam; Querystring: PaginationQuery }>(
    "/sources/:sourceId/orphans",
    {
      schema: {
        summary: "List orphaned relations",
        description:
          "Returns the relations of a source whose target was never found within the source",
        tags: ["Relations"],
        params: SourceIdParamSchema,
        querystring: PaginationQuerySchema,
        response: {
          200: OrphanListResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { limit = 20, offset = 0 } = request.query;
      const source = await deps.service.sources.requireSource(request.params.sourceId);

      const edges = await listOrphans(deps.db, source.id, { limit: limit + 1, offset });

      return reply.send({
        data: edges.slice(0, limit).map(formatOrphan),
        meta: {
          pagination: { limit, offset, hasMore: edges.length > limit },
        },
      });
    }
  );
}

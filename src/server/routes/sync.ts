/**
 * Sync API Routes
 *
 * Run status and cancellation. Runs are triggered per source, see
 * sources.ts.
 */

import { Type } from "@sinclair/typebox";

import { RunIdParamSchema, type RunIdParam } from "../schemas/common.js";
import { SyncStatusResponseSchema } from "../schemas/responses.js";

import type { ApiDependencies } from "./index.js";
import type { FastifyInstance } from "fastify";

const CancelRunResponseSchema = Type.Object({
  data: Type.Object({
    runId: Type.Integer(),
    cancelled: Type.Boolean(),
    message: Type.String(),
  }),
});

// ============================================================================
// Route Registration
// ============================================================================

export function registerSyncRoutes(app: FastifyInstance, deps: ApiDependencies): void {
  const { service } = deps;

  // GET /sync/runs/:runId - Status of one run
  app.get<{ Params: RunIdParam }>(
    "/sync/runs/:runId",
    {
      schema: {
        summary: "Get sync run status",
        description:
          "Returns the state, per-entity-type counters, error samples and relation summary of a run",
        tags: ["Sync"],
        params: RunIdParamSchema,
        response: {
          200: SyncStatusResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const status = await service.getSyncStatus(request.params.runId);
      return reply.send({ data: status });
    }
  );

  // DELETE /sync/runs/:runId - Cancel a run of this process
  app.delete<{ Params: RunIdParam }>(
    "/sync/runs/:runId",
    {
      schema: {
        summary: "Cancel sync run",
        description:
          "Cancels a queued or running run executed by this process. A running run stops at its next page boundary and ends FAILED.",
        tags: ["Sync"],
        params: RunIdParamSchema,
        response: {
          200: CancelRunResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const status = await service.getSyncStatus(request.params.runId);
      const cancelled = await service.cancel(status.runId);
      const message = cancelled
        ? `Cancellation requested for run ${String(status.runId)}`
        : `Run ${String(status.runId)} is ${status.state.toLowerCase()} and not active in this process`;
      return reply.send({ data: { runId: status.runId, cancelled, message } });
    }
  );
}

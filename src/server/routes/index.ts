/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { checkConnection } from "../../db/connection.js";

import { registerRelationRoutes } from "./relations.js";
import { registerSourceRoutes } from "./sources.js";
import { registerSyncRoutes } from "./sync.js";

import type { Database } from "../../db/types.js";
import type { SyncService } from "../../services/sync/service.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

/**
 * What the route handlers work against
 */
export interface ApiDependencies {
  db: Kysely<Database>;
  service: SyncService;
}

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Union([Type.Literal("ok"), Type.Literal("degraded")]),
    database: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", database: true }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDependencies
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API and its database",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      const database = await checkConnection(deps.db);
      return { status: database ? ("ok" as const) : ("degraded" as const), database };
    }
  );

  // API v1 routes
  await app.register(
    (api, _opts, done) => {
      registerSourceRoutes(api, deps);
      registerSyncRoutes(api, deps);
      registerRelationRoutes(api, deps);
      done();
    },
    { prefix: "/api/v1" }
  );
}

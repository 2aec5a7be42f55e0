/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

export interface OpenapiOptions {
  serverUrl?: string;
}

function openapiPlugin(
  fastify: FastifyInstance,
  opts: OpenapiOptions,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "OParl Ingestor API",
        description:
          "Control API of the OParl ingestion engine. Registers municipal OParl endpoints as sources, " +
          "triggers full or incremental sync runs and reports their per-entity-type counters, " +
          "diagnostics and unresolved relations.",
        version: "1.0.0",
      },
      servers: [
        {
          url: opts.serverUrl ?? "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Liveness of the API and its database",
        },
        {
          name: "Sources",
          description: "Registered OParl endpoints and their sync configuration",
        },
        {
          name: "Sync",
          description: "Trigger sync runs and read their status",
        },
        {
          name: "Relations",
          description: "Relations that could not be resolved within their source",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });

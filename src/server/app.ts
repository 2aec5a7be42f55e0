import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes, type ApiDependencies } from "./routes/index.js";

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
  serverUrl?: string;
}

/**
 * Assemble the Fastify instance without listening, so tests can `inject`
 */
export async function buildApp(
  deps: ApiDependencies,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? fastifyLoggerConfig,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi, { serverUrl: options.serverUrl });

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, deps);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}

import { loadConfig } from "../config.js";
import { closeConnection, createDatabase } from "../db/connection.js";
import { serverLogger } from "../logger.js";
import { SyncService } from "../services/sync/service.js";

import { buildApp } from "./app.js";

export interface ServeOptions {
  port?: number;
  host?: string;
}

/**
 * Start the API with a sync service that executes the runs it triggers.
 * Resolves once the server is listening; SIGINT/SIGTERM shut it down.
 */
export async function serve(options: ServeOptions = {}): Promise<void> {
  const config = loadConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  const handle = createDatabase({ url: config.databaseUrl, poolMax: config.dbPoolMax });
  const service = new SyncService(handle.db, {
    concurrency: config.sync.concurrency,
    orchestrator: config.sync,
    sourceDefaults: {
      requestTimeoutSeconds: config.sync.defaultRequestTimeoutSeconds,
      maxRetries: config.sync.defaultMaxRetries,
    },
  });
  await service.start();

  const app = await buildApp(
    { db: handle.db, service },
    { serverUrl: `http://localhost:${String(port)}` }
  );

  const shutdown = async (signal: string): Promise<void> => {
    serverLogger.info({ signal }, "Shutting down");
    await app.close();
    await service.shutdown();
    await closeConnection(handle);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          serverLogger.error({ error }, "Shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port, host });
  app.log.info({ host, port, database: handle.displayUrl }, "Server started");
}

// Run directly: tsx src/server/index.ts / node dist/server/index.js
if (/[\\/]server[\\/]index\.(ts|js)$/.test(process.argv[1] ?? "")) {
  serve().catch((err: unknown) => {
    serverLogger.error({ err }, "Failed to start server");
    process.exit(1);
  });
}

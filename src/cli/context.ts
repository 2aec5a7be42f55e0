/**
 * Shared setup for CLI commands: configuration, database and sync service
 */

import { loadConfig, type AppConfig } from "../config.js";
import {
  closeConnection,
  createDatabase,
  type DatabaseHandle,
} from "../db/connection.js";
import { SyncService } from "../services/sync/service.js";

export interface CliContext {
  config: AppConfig;
  handle: DatabaseHandle;
  service: SyncService;
}

export function createCliContext(config: AppConfig = loadConfig()): CliContext {
  const handle = createDatabase({ url: config.databaseUrl, poolMax: config.dbPoolMax });
  const service = new SyncService(handle.db, {
    concurrency: config.sync.concurrency,
    orchestrator: config.sync,
    sourceDefaults: {
      requestTimeoutSeconds: config.sync.defaultRequestTimeoutSeconds,
      maxRetries: config.sync.defaultMaxRetries,
    },
  });
  return { config, handle, service };
}

/**
 * Run a command body against a fresh context and always close it.
 * Errors are reported by the caller's spinner; this only guarantees
 * cleanup.
 */
export async function withCliContext<T>(
  body: (ctx: CliContext) => Promise<T>
): Promise<T> {
  const ctx = createCliContext();
  try {
    return await body(ctx);
  } finally {
    await ctx.service.shutdown();
    await closeConnection(ctx.handle);
  }
}

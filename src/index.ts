// Library entry point

export { loadConfig, type AppConfig, type SyncConfig } from "./config.js";
export {
  createDatabase,
  closeConnection,
  checkConnection,
  type DatabaseHandle,
} from "./db/connection.js";
export { runMigration } from "./db/migrate.js";
export * from "./errors.js";
export { OParlClient, type FetchLike, type ListPageResult } from "./scraper/client.js";
export { RetryPolicy, type RetryEvent, type RetryOptions } from "./scraper/retry.js";
export * from "./services/sync/index.js";
export type * from "./types/index.js";
export { ENTITY_TYPES, BODY_ENTITY_SEQUENCE, RELATION_TYPES, isEntityType } from "./types/index.js";

/**
 * Ingestion error taxonomy
 *
 * Every error carries a stable `code` so that run diagnostics, CLI output
 * and HTTP responses can classify it without string matching.
 */

import type { EntityType, RelationType } from "./types/index.js";

export type SyncErrorKind =
  | "fetch"
  | "parse"
  | "validation"
  | "storage"
  | "orphaned_relation"
  | "cancelled"
  | "lease_lost"
  | "lease_unavailable"
  | "stale_run"
  | "internal";

export abstract class IngestError extends Error {
  abstract readonly code: string;
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network, timeout or HTTP status failure. `retryable` is true for
 * connection errors, timeouts, 5xx and 429.
 */
export class FetchError extends IngestError {
  readonly code = "FETCH_ERROR" as const;
  readonly kind = "fetch" as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null,
    readonly retryable: boolean,
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ParseError extends IngestError {
  readonly code = "PARSE_ERROR" as const;
  readonly kind = "parse" as const;

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ValidationError extends IngestError {
  readonly code = "VALIDATION_ERROR" as const;
  readonly kind = "validation" as const;

  constructor(
    message: string,
    readonly entityType: EntityType,
    readonly externalId: string | null,
    readonly missingFields: string[],
    readonly rawPayload: unknown
  ) {
    super(message);
  }
}

export class RelationResolutionFailure extends IngestError {
  readonly code = "RELATION_UNRESOLVED" as const;
  readonly kind = "orphaned_relation" as const;

  constructor(
    readonly relationType: RelationType,
    readonly fromEntityId: number,
    readonly targetExternalId: string,
    readonly attempts: number
  ) {
    super(
      `Relation ${relationType} from entity ${String(fromEntityId)} to ${targetExternalId} unresolved after ${String(attempts)} runs`
    );
  }
}

export class StorageError extends IngestError {
  readonly code = "STORAGE_ERROR" as const;
  readonly kind = "storage" as const;

  constructor(
    message: string,
    readonly entityType: EntityType | null,
    readonly externalId: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class LeaseError extends IngestError {
  readonly code = "LEASE_ERROR" as const;

  constructor(
    message: string,
    readonly kind: "lease_lost" | "lease_unavailable",
    readonly sourceId: number
  ) {
    super(message);
  }
}

export class SyncCancelledError extends IngestError {
  readonly code = "SYNC_CANCELLED" as const;
  readonly kind = "cancelled" as const;

  constructor(message = "Sync run cancelled") {
    super(message);
  }
}

export class NotFoundError extends IngestError {
  readonly code = "NOT_FOUND" as const;
  readonly kind = "internal" as const;

  constructor(
    readonly resource: "source" | "run",
    readonly id: number
  ) {
    super(`${resource === "source" ? "Source" : "Sync run"} ${String(id)} not found`);
  }
}

export class ConfigError extends IngestError {
  readonly code = "CONFIG_ERROR" as const;
  readonly kind = "internal" as const;

  constructor(
    message: string,
    readonly problems: string[]
  ) {
    super(message);
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

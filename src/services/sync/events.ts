/**
 * Sync events for downstream consumers (search indexing, notifications)
 */

import { EventEmitter } from "node:events";

import { syncLogger } from "../../logger.js";

import type {
  EntityType,
  RelationType,
  RunState,
  SyncMode,
} from "../../types/index.js";

// ============================================================================
// Event Payloads
// ============================================================================

export interface SyncEventMap {
  "run:started": {
    runId: number;
    sourceId: number;
    mode: SyncMode;
    highWaterMarkUsed: string | null;
  };
  "run:finished": {
    runId: number;
    sourceId: number;
    state: RunState;
    durationMs: number;
    errorCount: number;
  };
  "entity:changed": {
    runId: number;
    sourceId: number;
    entityType: EntityType;
    entityId: number;
    externalId: string;
    change: "inserted" | "updated";
  };
  "relation:orphaned": {
    runId: number;
    sourceId: number;
    relationType: RelationType;
    fromEntityId: number;
    targetExternalId: string;
  };
}

export type SyncEventName = keyof SyncEventMap;

export type SyncEventListener<K extends SyncEventName> = (
  payload: SyncEventMap[K]
) => void;

// ============================================================================
// SyncEvents
// ============================================================================

/**
 * Typed wrapper over a Node EventEmitter. A throwing listener is logged and
 * never interrupts the run that emitted the event.
 */
export class SyncEvents {
  private readonly emitter = new EventEmitter();

  on<K extends SyncEventName>(event: K, listener: SyncEventListener<K>): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends SyncEventName>(event: K, listener: SyncEventListener<K>): this {
    this.emitter.off(event, listener);
    return this;
  }

  once<K extends SyncEventName>(event: K, listener: SyncEventListener<K>): this {
    this.emitter.once(event, listener);
    return this;
  }

  emit<K extends SyncEventName>(event: K, payload: SyncEventMap[K]): void {
    try {
      this.emitter.emit(event, payload);
    } catch (error) {
      syncLogger.error({ event, error }, "Sync event listener failed");
    }
  }

  listenerCount(event: SyncEventName): number {
    return this.emitter.listenerCount(event);
  }
}

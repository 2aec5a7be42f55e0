/**
 * API Request/Response Types
 */

import type { SyncMode } from "./index.js";

// ============================================================================
// Errors
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sources
// ============================================================================

/**
 * A source as exposed over HTTP; the credential itself never leaves the
 * store
 */
export interface SourceDto {
  id: number;
  name: string;
  baseUrl: string;
  hasCredential: boolean;
  requestTimeoutSeconds: number;
  maxRetries: number;
  defaultMode: SyncMode;
  enabled: boolean;
  highWaterMark: string | null;
  lastRunId: number | null;
  leaseOwner: string | null;
  leaseExpiresAt: string | null;
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Relations
// ============================================================================

export interface OrphanDto {
  id: number;
  relationType: string;
  fromEntityId: number;
  targetExternalId: string;
  unresolvedAttempts: number;
  lastAttemptRunId: number | null;
  updatedAt: string;
}

import type {
  EntityType,
  JsonObject,
  JsonValue,
  OParlObject,
} from "../../../types/index.js";

// ============================================================================
// Constants
// ============================================================================

export const MAX_NAME_LENGTH = 500;

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TYPE_URL_PATTERN = /^https?:\/\/schema\.oparl\.org\/(\d+\.\d+)\/(\w+)$/;

/**
 * OParl object type names (as they appear at the end of a `type` URL)
 */
const OPARL_TYPE_NAMES: Record<string, EntityType> = {
  Body: "body",
  LegislativeTerm: "legislative_term",
  Organization: "organization",
  Person: "person",
  Location: "location",
  Membership: "membership",
  Meeting: "meeting",
  Paper: "paper",
  AgendaItem: "agenda_item",
  Consultation: "consultation",
  File: "file",
};

// ============================================================================
// Value Readers
// ============================================================================

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Non-empty string, or null
 */
export function text(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

/**
 * Some servers send single-valued strings as arrays; take the first entry
 */
export function firstText(value: JsonValue | undefined): string | null {
  if (Array.isArray(value)) {
    return text(value[0]);
  }
  return text(value);
}

export function truncateName(value: string | null): string | null {
  if (value === null || value.length <= MAX_NAME_LENGTH) {
    return value;
  }
  return `${value.slice(0, MAX_NAME_LENGTH - 3)}...`;
}

/**
 * ISO-8601 UTC date-time. A bare date becomes midnight UTC; anything that
 * does not parse becomes null.
 */
export function dateTime(value: JsonValue | undefined): string | null {
  const raw = text(value);
  if (raw === null) {
    return null;
  }
  const parsed = Date.parse(DATE_ONLY_PATTERN.test(raw) ? `${raw}T00:00:00Z` : raw);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
}

export function bool(value: JsonValue | undefined): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === 1) {
    return true;
  }
  if (value === "false" || value === 0) {
    return false;
  }
  return null;
}

export function integer(value: JsonValue | undefined): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return null;
}

// ============================================================================
// References
// ============================================================================

/**
 * Id of a reference given either as a URL string or as an embedded object
 */
export function refId(value: JsonValue | undefined): string | null {
  if (isJsonObject(value)) {
    return text(value.id);
  }
  return text(value);
}

/**
 * Ids of a single reference or a list of references
 */
export function refIds(value: JsonValue | undefined): string[] {
  const values = Array.isArray(value) ? value : [value];
  const ids: string[] = [];
  for (const entry of values) {
    const id = refId(entry);
    if (id !== null) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Embedded objects (not bare URLs) of a single or list-valued field
 */
export function embedded(value: JsonValue | undefined): OParlObject[] {
  const values = Array.isArray(value) ? value : [value];
  return values.filter(
    (entry): entry is JsonObject => isJsonObject(entry) && text(entry.id) !== null
  );
}

// ============================================================================
// Type Detection
// ============================================================================

export interface DeclaredType {
  version: string;
  typeName: string;
  entityType: EntityType | null;
}

/**
 * Read the OParl `type` URL, e.g. https://schema.oparl.org/1.1/Meeting.
 * Null when the payload declares no type or an unrecognised URL.
 */
export function declaredType(payload: OParlObject): DeclaredType | null {
  const raw = text(payload.type);
  if (raw === null) {
    return null;
  }
  const match = TYPE_URL_PATTERN.exec(raw);
  if (match === null) {
    return null;
  }
  const [, version = "", typeName = ""] = match;
  return {
    version,
    typeName,
    entityType: OPARL_TYPE_NAMES[typeName] ?? null,
  };
}

// OParl 1.0 / 1.1 types and the canonical records derived from them

// =====================
// JSON
// =====================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// =====================
// Upstream Protocol
// =====================

/**
 * Any OParl object as received. Only `id`, `type`, `created` and
 * `modified` are common to all types; everything else is read through the
 * field helpers in services/sync/canonical/fields.ts.
 */
export type OParlObject = JsonObject;

/**
 * List page envelope - GET on any list URL
 */
export interface OParlListPage {
  data: OParlObject[];
  pagination?: {
    totalElements?: number;
    elementsPerPage?: number;
    currentPage?: number;
    totalPages?: number;
  };
  links?: {
    first?: string;
    prev?: string;
    next?: string;
    last?: string;
  };
}

/**
 * System object - the entry point every source is registered with
 */
export interface OParlSystem {
  id: string;
  name: string | null;
  oparlVersion: string | null;
  bodyListUrl: string;
  website: string | null;
  vendor: string | null;
  product: string | null;
}

// =====================
// Entity Types
// =====================

export const ENTITY_TYPES = [
  "body",
  "legislative_term",
  "organization",
  "person",
  "location",
  "membership",
  "meeting",
  "paper",
  "agenda_item",
  "consultation",
  "file",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Per-body entity types in the order they are fetched. Referenced entities
 * come first so that fewer edges stay pending until the reconciliation
 * pass; correctness does not depend on it.
 */
export const BODY_ENTITY_SEQUENCE: readonly Exclude<EntityType, "body">[] = [
  "legislative_term",
  "organization",
  "person",
  "location",
  "membership",
  "meeting",
  "paper",
  "agenda_item",
  "consultation",
  "file",
];

export function isEntityType(value: string): value is EntityType {
  return (ENTITY_TYPES as readonly string[]).includes(value);
}

export type SyncMode = "FULL" | "INCREMENTAL";

export type RunState = "PENDING" | "RUNNING" | "SUCCESS" | "PARTIAL" | "FAILED";

export type RelationStatus = "PENDING" | "RESOLVED" | "ORPHANED";

export const RELATION_TYPES = [
  "body.legislativeTerm",
  "legislative_term.body",
  "organization.body",
  "organization.location",
  "person.body",
  "person.location",
  "location.body",
  "membership.person",
  "membership.organization",
  "membership.onBehalfOf",
  "meeting.organization",
  "meeting.location",
  "meeting.participant",
  "meeting.file",
  "meeting.agendaItem",
  "agenda_item.meeting",
  "agenda_item.consultation",
  "agenda_item.file",
  "paper.body",
  "paper.consultation",
  "paper.file",
  "paper.originatorPerson",
  "paper.originatorOrganization",
  "paper.underDirectionOf",
  "paper.relatedPaper",
  "paper.location",
  "consultation.paper",
  "consultation.meeting",
  "consultation.agendaItem",
  "consultation.organization",
  "file.paper",
  "file.meeting",
  "file.agendaItem",
] as const;

export type RelationType = (typeof RELATION_TYPES)[number];

// =====================
// Canonical Fields
// =====================

export interface BodyFields {
  shortName: string | null;
  website: string | null;
  license: string | null;
  classification: string | null;
  contactEmail: string | null;
  lists: BodyListUrls;
}

/**
 * List endpoints announced by a body, keyed by the entity type they serve
 */
export type BodyListUrls = Partial<
  Record<Exclude<EntityType, "body">, string>
>;

export interface LegislativeTermFields {
  startDate: string | null;
  endDate: string | null;
}

export interface OrganizationFields {
  shortName: string | null;
  organizationType: string | null;
  classification: string | null;
  startDate: string | null;
  endDate: string | null;
  website: string | null;
}

export type Gender = "FEMALE" | "MALE" | "OTHER" | "UNKNOWN";

export interface PersonFields {
  familyName: string | null;
  givenName: string | null;
  title: string | null;
  gender: Gender | null;
  email: string | null;
  phone: string | null;
}

export interface LocationFields {
  description: string | null;
  streetAddress: string | null;
  room: string | null;
  postalCode: string | null;
  locality: string | null;
  geojson: JsonObject | null;
}

export interface MembershipFields {
  role: string | null;
  votingRight: boolean | null;
  startDate: string | null;
  endDate: string | null;
}

export type MeetingState = "SCHEDULED" | "INVITED" | "HELD" | "OTHER";

export interface MeetingFields {
  meetingState: MeetingState | null;
  meetingStateRaw: string | null;
  cancelled: boolean | null;
  start: string | null;
  end: string | null;
}

export interface AgendaItemFields {
  number: string | null;
  order: number | null;
  public: boolean | null;
  result: string | null;
  resolutionText: string | null;
  start: string | null;
  end: string | null;
}

export interface PaperFields {
  reference: string | null;
  paperType: string | null;
  date: string | null;
}

export interface ConsultationFields {
  role: string | null;
  authoritative: boolean | null;
}

export interface FileFields {
  fileName: string | null;
  mimeType: string | null;
  size: number | null;
  accessUrl: string;
  downloadUrl: string | null;
  date: string | null;
  sha512Checksum: string | null;
}

export interface EntityFieldsMap {
  body: BodyFields;
  legislative_term: LegislativeTermFields;
  organization: OrganizationFields;
  person: PersonFields;
  location: LocationFields;
  membership: MembershipFields;
  meeting: MeetingFields;
  paper: PaperFields;
  agenda_item: AgendaItemFields;
  consultation: ConsultationFields;
  file: FileFields;
}

// =====================
// Canonical Records
// =====================

export interface EntityReference {
  relationType: RelationType;
  targetExternalId: string;
}

/**
 * A normalized record. `fields` follows `entityType` when T is a single
 * type; the default is the record of any type.
 */
export interface CanonicalRecord<T extends EntityType = EntityType> {
  entityType: T;
  externalId: string;
  bodyExternalId: string | null;
  name: string | null;
  fields: EntityFieldsMap[T];
  rawPayload: OParlObject;
  contentHash: string;
  upstreamCreatedAt: string | null;
  upstreamModifiedAt: string | null;
  deleted: boolean;
  references: EntityReference[];
}

// =====================
// Sync Runs
// =====================

export interface EntityCounters {
  fetched: number;
  upserted: number;
  skipped: number;
  failed: number;
  inserted: number;
  updated: number;
}

export type EntityCountersMap = Partial<Record<EntityType, EntityCounters>>;

export interface RelationSummary {
  resolved: number;
  stillPending: number;
  orphaned: number;
}

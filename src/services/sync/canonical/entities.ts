/**
 * Per-type field mapping from OParl payloads to canonical fields.
 *
 * Each entry lists the fields a payload must carry, maps the typed fields,
 * extracts outgoing references and names the embedded objects that are
 * stored as records of their own.
 */

import {
  bool,
  dateTime,
  embedded,
  firstText,
  integer,
  isJsonObject,
  refId,
  refIds,
  text,
} from "./fields.js";

import type {
  BodyListUrls,
  EntityFieldsMap,
  EntityReference,
  EntityType,
  Gender,
  JsonValue,
  MeetingState,
  OParlObject,
  RelationType,
} from "../../../types/index.js";

// ============================================================================
// Types
// ============================================================================

type FieldValue = JsonValue | undefined;

/**
 * The record an embedded object was found in
 */
export interface ParentContext {
  entityType: EntityType;
  externalId: string;
}

export interface NestedPayload {
  entityType: EntityType;
  payload: OParlObject;
}

export interface Extraction<T extends EntityType> {
  name: string | null;
  fields: EntityFieldsMap[T];
  references: EntityReference[];
  nested: NestedPayload[];
}

export interface EntityNormalizer<T extends EntityType> {
  /** Names of required fields (or alternatives) the payload lacks */
  missing: (payload: OParlObject, parent: ParentContext | null) => string[];
  extract: (payload: OParlObject) => Extraction<T>;
}

// ============================================================================
// Helpers
// ============================================================================

class ReferenceCollector {
  private readonly seen = new Set<string>();
  readonly references: EntityReference[] = [];

  add(relationType: RelationType, ...values: FieldValue[]): this {
    for (const value of values) {
      for (const targetExternalId of refIds(value)) {
        const key = `${relationType} ${targetExternalId}`;
        if (!this.seen.has(key)) {
          this.seen.add(key);
          this.references.push({ relationType, targetExternalId });
        }
      }
    }
    return this;
  }
}

function nestedOf(
  entityType: EntityType,
  ...values: FieldValue[]
): NestedPayload[] {
  return values.flatMap((value) =>
    embedded(value).map((payload) => ({ entityType, payload }))
  );
}

function requireOneOf(
  payload: OParlObject,
  ...keys: string[]
): string[] {
  const present = keys.some((key) => text(payload[key]) !== null);
  return present ? [] : [keys.join(" or ")];
}

// ============================================================================
// Vocabulary Mapping
// ============================================================================

const MEETING_STATES: Record<string, MeetingState> = {
  terminiert: "SCHEDULED",
  eingeladen: "INVITED",
  durchgeführt: "HELD",
};

export function mapMeetingState(raw: string | null): MeetingState | null {
  if (raw === null) {
    return null;
  }
  return MEETING_STATES[raw.toLowerCase()] ?? "OTHER";
}

const GENDERS: Record<string, Gender> = {
  female: "FEMALE",
  weiblich: "FEMALE",
  male: "MALE",
  männlich: "MALE",
  unknown: "UNKNOWN",
};

export function mapGender(raw: string | null): Gender | null {
  if (raw === null) {
    return null;
  }
  return GENDERS[raw.toLowerCase()] ?? "OTHER";
}

/**
 * List endpoints announced by a body. Servers differ in singular and
 * plural key names.
 */
export function bodyListUrls(payload: OParlObject): BodyListUrls {
  const lists: BodyListUrls = {};
  const candidates: [keyof BodyListUrls, string[]][] = [
    ["legislative_term", ["legislativeTermList"]],
    ["organization", ["organization"]],
    ["person", ["person"]],
    ["location", ["locationList"]],
    ["membership", ["membership"]],
    ["meeting", ["meeting"]],
    ["paper", ["paper"]],
    ["agenda_item", ["agendaItem"]],
    ["consultation", ["consultation", "consultations"]],
    ["file", ["file", "files"]],
  ];
  for (const [entityType, keys] of candidates) {
    for (const key of keys) {
      const value = payload[key];
      const url = typeof value === "string" ? text(value) : null;
      if (url !== null) {
        lists[entityType] = url;
        break;
      }
    }
  }
  return lists;
}

/**
 * Reference an embedded record gets to the record it was embedded in, when
 * its own payload omits it
 */
export const BACK_REFERENCES: Partial<
  Record<EntityType, Partial<Record<EntityType, RelationType>>>
> = {
  legislative_term: { body: "legislative_term.body" },
  agenda_item: { meeting: "agenda_item.meeting" },
  consultation: { paper: "consultation.paper" },
  file: {
    meeting: "file.meeting",
    paper: "file.paper",
    agenda_item: "file.agendaItem",
  },
};

// ============================================================================
// Normalizers
// ============================================================================

export const NORMALIZERS: { [K in EntityType]: EntityNormalizer<K> } = {
  body: {
    missing: (payload) => requireOneOf(payload, "name"),
    extract: (payload) => ({
      name: text(payload.name),
      fields: {
        shortName: text(payload.shortName),
        website: text(payload.website),
        license: text(payload.license),
        classification: text(payload.classification),
        contactEmail: firstText(payload.contactEmail),
        lists: bodyListUrls(payload),
      },
      references: new ReferenceCollector().add(
        "body.legislativeTerm",
        payload.legislativeTerm
      ).references,
      nested: nestedOf("legislative_term", payload.legislativeTerm),
    }),
  },

  legislative_term: {
    missing: () => [],
    extract: (payload) => ({
      name: text(payload.name),
      fields: {
        startDate: dateTime(payload.startDate),
        endDate: dateTime(payload.endDate),
      },
      references: new ReferenceCollector().add(
        "legislative_term.body",
        payload.body
      ).references,
      nested: [],
    }),
  },

  organization: {
    missing: (payload) => requireOneOf(payload, "name", "shortName"),
    extract: (payload) => ({
      name: text(payload.name) ?? text(payload.shortName),
      fields: {
        shortName: text(payload.shortName),
        organizationType: text(payload.organizationType),
        classification: text(payload.classification),
        startDate: dateTime(payload.startDate),
        endDate: dateTime(payload.endDate),
        website: text(payload.website),
      },
      references: new ReferenceCollector()
        .add("organization.body", payload.body)
        .add("organization.location", payload.location).references,
      nested: [],
    }),
  },

  person: {
    missing: (payload) =>
      requireOneOf(payload, "name", "familyName", "givenName"),
    extract: (payload) => {
      const givenName = text(payload.givenName);
      const familyName = text(payload.familyName);
      const composed = [givenName, familyName]
        .filter((part): part is string => part !== null)
        .join(" ");
      return {
        name: text(payload.name) ?? (composed === "" ? null : composed),
        fields: {
          familyName,
          givenName,
          title: firstText(payload.title),
          gender: mapGender(text(payload.gender)),
          email: firstText(payload.email),
          phone: firstText(payload.phone),
        },
        references: new ReferenceCollector()
          .add("person.body", payload.body)
          .add("person.location", payload.location).references,
        nested: [],
      };
    },
  },

  location: {
    missing: () => [],
    extract: (payload) => ({
      name:
        text(payload.description) ??
        text(payload.room) ??
        text(payload.streetAddress),
      fields: {
        description: text(payload.description),
        streetAddress: text(payload.streetAddress),
        room: text(payload.room),
        postalCode: text(payload.postalCode),
        locality: text(payload.locality),
        geojson: isJsonObject(payload.geojson) ? payload.geojson : null,
      },
      references: new ReferenceCollector().add(
        "location.body",
        payload.body,
        payload.bodies
      ).references,
      nested: [],
    }),
  },

  membership: {
    missing: (payload) => [
      ...(refId(payload.person) === null ? ["person"] : []),
      ...(refId(payload.organization) === null ? ["organization"] : []),
    ],
    extract: (payload) => ({
      name: text(payload.role),
      fields: {
        role: text(payload.role),
        votingRight: bool(payload.votingRight),
        startDate: dateTime(payload.startDate),
        endDate: dateTime(payload.endDate),
      },
      references: new ReferenceCollector()
        .add("membership.person", payload.person)
        .add("membership.organization", payload.organization)
        .add("membership.onBehalfOf", payload.onBehalfOf).references,
      nested: [],
    }),
  },

  meeting: {
    missing: (payload) =>
      dateTime(payload.start) !== null || bool(payload.cancelled) === true
        ? []
        : ["start or cancelled"],
    extract: (payload) => {
      const meetingStateRaw = text(payload.meetingState);
      return {
        name: text(payload.name),
        fields: {
          meetingState: mapMeetingState(meetingStateRaw),
          meetingStateRaw,
          cancelled: bool(payload.cancelled),
          start: dateTime(payload.start),
          end: dateTime(payload.end),
        },
        references: new ReferenceCollector()
          .add("meeting.organization", payload.organization)
          .add("meeting.location", payload.location)
          .add("meeting.participant", payload.participant)
          .add(
            "meeting.file",
            payload.invitation,
            payload.resultsProtocol,
            payload.verbatimProtocol,
            payload.auxiliaryFile
          )
          .add("meeting.agendaItem", payload.agendaItem).references,
        nested: [
          ...nestedOf("location", payload.location),
          ...nestedOf("agenda_item", payload.agendaItem),
          ...nestedOf(
            "file",
            payload.invitation,
            payload.resultsProtocol,
            payload.verbatimProtocol,
            payload.auxiliaryFile
          ),
        ],
      };
    },
  },

  agenda_item: {
    missing: (payload) => requireOneOf(payload, "name", "number"),
    extract: (payload) => ({
      name: text(payload.name) ?? text(payload.number),
      fields: {
        number: text(payload.number),
        order: integer(payload.order),
        public: bool(payload.public),
        result: text(payload.result),
        resolutionText: text(payload.resolutionText),
        start: dateTime(payload.start),
        end: dateTime(payload.end),
      },
      references: new ReferenceCollector()
        .add("agenda_item.meeting", payload.meeting)
        .add("agenda_item.consultation", payload.consultation)
        .add("agenda_item.file", payload.resolutionFile, payload.auxiliaryFile)
        .references,
      nested: nestedOf("file", payload.resolutionFile, payload.auxiliaryFile),
    }),
  },

  paper: {
    missing: (payload) => requireOneOf(payload, "name", "reference"),
    extract: (payload) => ({
      name: text(payload.name) ?? text(payload.reference),
      fields: {
        reference: text(payload.reference),
        paperType: text(payload.paperType),
        date: dateTime(payload.date),
      },
      references: new ReferenceCollector()
        .add("paper.body", payload.body)
        .add("paper.consultation", payload.consultation)
        .add("paper.file", payload.mainFile, payload.auxiliaryFile)
        .add("paper.originatorPerson", payload.originatorPerson)
        .add("paper.originatorOrganization", payload.originatorOrganization)
        .add("paper.underDirectionOf", payload.underDirectionOf)
        .add("paper.relatedPaper", payload.relatedPaper)
        .add("paper.location", payload.location).references,
      nested: [
        ...nestedOf("file", payload.mainFile, payload.auxiliaryFile),
        ...nestedOf("consultation", payload.consultation),
        ...nestedOf("location", payload.location),
      ],
    }),
  },

  consultation: {
    missing: (payload, parent) =>
      parent !== null ||
      refId(payload.paper) !== null ||
      refId(payload.agendaItem) !== null ||
      refId(payload.meeting) !== null
        ? []
        : ["paper or agendaItem or meeting"],
    extract: (payload) => ({
      name: text(payload.role),
      fields: {
        role: text(payload.role),
        authoritative: bool(payload.authoritative),
      },
      references: new ReferenceCollector()
        .add("consultation.paper", payload.paper)
        .add("consultation.meeting", payload.meeting)
        .add("consultation.agendaItem", payload.agendaItem)
        .add("consultation.organization", payload.organization).references,
      nested: [],
    }),
  },

  file: {
    missing: (payload) => requireOneOf(payload, "accessUrl"),
    extract: (payload) => ({
      name: text(payload.name) ?? text(payload.fileName),
      fields: {
        fileName: text(payload.fileName),
        mimeType: text(payload.mimeType),
        size: integer(payload.size),
        accessUrl: text(payload.accessUrl) ?? "",
        downloadUrl: text(payload.downloadUrl),
        date: dateTime(payload.date),
        sha512Checksum: text(payload.sha512Checksum),
      },
      references: new ReferenceCollector()
        .add("file.paper", payload.paper)
        .add("file.meeting", payload.meeting)
        .add("file.agendaItem", payload.agendaItem).references,
      nested: [],
    }),
  },
};

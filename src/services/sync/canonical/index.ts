/**
 * Entity Normalizer
 *
 * Turns one raw OParl payload into a canonical record, plus the records of
 * the objects embedded in it, or into a ValidationError that keeps the raw
 * payload for diagnostics.
 */

import { ValidationError } from "../../../errors.js";
import { syncLogger } from "../../../logger.js";

import {
  BACK_REFERENCES,
  NORMALIZERS,
  type ParentContext,
} from "./entities.js";
import { bool, dateTime, declaredType, text, truncateName } from "./fields.js";
import { computeContentHash } from "./hash.js";

import type {
  CanonicalRecord,
  EntityType,
  OParlObject,
} from "../../../types/index.js";

export { bodyListUrls, mapGender, mapMeetingState } from "./entities.js";
export { canonicalJson, computeContentHash } from "./hash.js";
export { dateTime, declaredType, truncateName } from "./fields.js";

// ============================================================================
// Types
// ============================================================================

export interface NormalizeContext {
  /** Body the payload was listed under */
  bodyExternalId?: string | null;
  parent?: ParentContext | null;
}

export type NormalizeResult<T extends EntityType = EntityType> =
  | {
      ok: true;
      record: CanonicalRecord<T>;
      /** Embedded records, depth-first */
      nested: CanonicalRecord[];
      /** Embedded objects that failed validation */
      nestedFailures: ValidationError[];
    }
  | { ok: false; failure: ValidationError };

// ============================================================================
// Normalize
// ============================================================================

export function normalize<T extends EntityType>(
  entityType: T,
  payload: OParlObject,
  context: NormalizeContext = {}
): NormalizeResult<T> {
  const externalId = text(payload.id);
  const parent = context.parent ?? null;

  const fail = (message: string, missingFields: string[]): NormalizeResult<T> => {
    const failure = new ValidationError(
      message,
      entityType,
      externalId,
      missingFields,
      payload
    );
    syncLogger.debug(
      { entityType, externalId, missingFields },
      "Payload failed validation"
    );
    return { ok: false, failure };
  };

  if (externalId === null) {
    return fail(`${entityType} payload has no id`, ["id"]);
  }

  const declared = declaredType(payload);
  if (declared !== null && declared.entityType !== entityType) {
    return fail(
      `${externalId} declares type ${declared.typeName}, expected ${entityType}`,
      []
    );
  }

  const normalizer = NORMALIZERS[entityType];
  const missingFields = normalizer.missing(payload, parent);
  if (missingFields.length > 0) {
    return fail(
      `${entityType} ${externalId} is missing ${missingFields.join(", ")}`,
      missingFields
    );
  }

  const extraction = normalizer.extract(payload);
  const references = [...extraction.references];

  const backReference =
    parent !== null ? BACK_REFERENCES[entityType]?.[parent.entityType] : undefined;
  if (
    parent !== null &&
    backReference !== undefined &&
    !references.some((ref) => ref.relationType === backReference)
  ) {
    references.push({
      relationType: backReference,
      targetExternalId: parent.externalId,
    });
  }

  const bodyExternalId =
    entityType === "body"
      ? externalId
      : (context.bodyExternalId ?? text(payload.body));

  const record: CanonicalRecord<T> = {
    entityType,
    externalId,
    bodyExternalId,
    name: truncateName(extraction.name),
    fields: extraction.fields,
    rawPayload: payload,
    contentHash: computeContentHash(payload),
    upstreamCreatedAt: dateTime(payload.created),
    upstreamModifiedAt: dateTime(payload.modified),
    deleted: bool(payload.deleted) === true,
    references,
  };

  const nested: CanonicalRecord[] = [];
  const nestedFailures: ValidationError[] = [];
  for (const child of extraction.nested) {
    const result = normalize(child.entityType, child.payload, {
      bodyExternalId,
      parent: { entityType, externalId },
    });
    if (result.ok) {
      nested.push(result.record, ...result.nested);
      nestedFailures.push(...result.nestedFailures);
    } else {
      nestedFailures.push(result.failure);
    }
  }

  return { ok: true, record, nested, nestedFailures };
}
